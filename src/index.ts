export * from './config';
export * from './utils/errors';
export * from './utils/textNormalization';
export { logger } from './utils/logger';
export { chunkArray, runInChunks } from './utils/chunks';
export * from './services/httpClient';
export * from './services/sparqlClient';
export * from './services/wdqsService';
export * from './services/viafService';
export * from './services/viafRecord';
export * from './services/authoritySparql';
export * from './services/bneService';
export * from './services/idrefService';
export * from './services/gettyService';
export * from './services/dnbService';
export * from './services/mediaWikiService';
export * from './services/mediaWikiEditService';
export * from './services/mediaWikiRestService';
export * from './services/wikimediaRestService';
