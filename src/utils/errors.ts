/**
 * Error types raised by the provider clients. Nothing in this library catches
 * them; callers decide what a failed lookup means.
 */

export interface RequestErrorDetails {
  url: string;
  status?: number;
  body?: string;
  cause?: unknown;
}

/** Transport failure, timeout or non-success HTTP status. */
export class RequestError extends Error {
  readonly url: string;
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, details: RequestErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'RequestError';
    this.url = details.url;
    this.status = details.status;
    this.body = details.body;
  }
}

/** The provider answered, but not in the format its API documents. */
export class ResponseFormatError extends Error {
  readonly url?: string;

  constructor(message: string, url?: string) {
    super(message);
    this.name = 'ResponseFormatError';
    this.url = url;
  }
}

/** MediaWiki Action API returned an `error` object. */
export class MediaWikiApiError extends Error {
  readonly code: string;
  readonly info: string;

  constructor(code: string, info: string) {
    super(`MediaWiki API error ${code}: ${info}`);
    this.name = 'MediaWikiApiError';
    this.code = code;
    this.info = info;
  }
}

export class AuthenticationError extends MediaWikiApiError {
  constructor(code: string, info: string) {
    super(code, info);
    this.name = 'AuthenticationError';
    this.message = `Authentication failed (${code}): ${info}`;
  }
}

/** Caller input rejected before any request was sent. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}
