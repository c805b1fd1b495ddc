import dotenv from 'dotenv';

dotenv.config();

const USER_AGENT_KEY = 'WIKI_CLIENT_USER_AGENT';
const TIMEOUT_MS_KEY = 'WIKI_CLIENT_TIMEOUT_MS';
const WDQS_ENDPOINT_KEY = 'WDQS_ENDPOINT';
const DEFAULT_PROJECT_KEY = 'WIKI_DEFAULT_PROJECT';
const LOG_LEVEL_KEY = 'LOG_LEVEL';

export const DEFAULT_USER_AGENT = 'wiki-authority-clients/1.0 (Node.js)';
export const DEFAULT_TIMEOUT_MS = 60000;
export const DEFAULT_WDQS_ENDPOINT = 'https://query.wikidata.org/sparql';
export const DEFAULT_PROJECT = 'en.wikipedia.org';

export interface ClientConfig {
  userAgent: string;
  timeoutMs: number;
  wdqsEndpoint: string;
  defaultProject: string;
  logLevel: string;
}

const parseIntegerEnv = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const readString = (key: string, fallback: string): string => {
  const value = (process.env[key] || '').trim();
  return value || fallback;
};

export const getClientConfig = (): ClientConfig => {
  const isTest = process.env.NODE_ENV === 'test';
  return {
    userAgent: readString(USER_AGENT_KEY, DEFAULT_USER_AGENT),
    timeoutMs: Math.max(500, parseIntegerEnv(process.env[TIMEOUT_MS_KEY], DEFAULT_TIMEOUT_MS)),
    wdqsEndpoint: readString(WDQS_ENDPOINT_KEY, DEFAULT_WDQS_ENDPOINT),
    defaultProject: readString(DEFAULT_PROJECT_KEY, DEFAULT_PROJECT),
    logLevel: readString(LOG_LEVEL_KEY, isTest ? 'silent' : 'info'),
  };
};
