export enum StatusCode {
  OK = 'ok',
  Error = 'error',
  Unknown = 'unknown',
  Unsupported = 'unsupported',
}

export interface StatusError {
  readonly message: string;
  readonly detailedError: string;
  readonly requestId?: string;
  readonly statusCode: number;
}

export interface Status {
  readonly code: StatusCode;
  readonly error?: StatusError;
}

/** Placeholder for failing statuses that arrive without details */
export function noneStatusError(): StatusError {
  return {
    message: 'none',
    detailedError: '',
    statusCode: 0,
  };
}
