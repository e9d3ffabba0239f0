export enum ErrorCode {
  E_IO_ERROR = 'E_IO_ERROR',
  E_INVALID_INPUT = 'E_INVALID_INPUT',
  E_ACCESS_DENIED = 'E_ACCESS_DENIED',
  E_UNKNOWN = 'E_UNKNOWN',
}

export interface DetailedError {
  code: ErrorCode;
  message: string;
  path?: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export class WalkError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly path?: string,
    readonly details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'WalkError';
  }

  static fromError(
    code: ErrorCode,
    message: string,
    error: unknown,
    path?: string
  ): WalkError {
    const details = isNodeError(error) ? { errno: error.code } : undefined;
    const walkError = new WalkError(code, message, path, details, error);
    if (error instanceof Error && error.stack) {
      walkError.stack = `${walkError.stack ?? ''}\nCaused by: ${error.stack}`;
    }
    return walkError;
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

export const NODE_ERROR_CODE_MAP: Readonly<Record<string, ErrorCode>> = {
  ENOENT: ErrorCode.E_IO_ERROR,
  EACCES: ErrorCode.E_IO_ERROR,
  EPERM: ErrorCode.E_IO_ERROR,
  EISDIR: ErrorCode.E_IO_ERROR,
  ENOTDIR: ErrorCode.E_IO_ERROR,
  ELOOP: ErrorCode.E_IO_ERROR,
  EIO: ErrorCode.E_IO_ERROR,
  EBUSY: ErrorCode.E_IO_ERROR,
  EMFILE: ErrorCode.E_IO_ERROR,
  ENFILE: ErrorCode.E_IO_ERROR,
  ENAMETOOLONG: ErrorCode.E_IO_ERROR,
  ETIMEDOUT: ErrorCode.E_IO_ERROR,
  EINVAL: ErrorCode.E_INVALID_INPUT,
};

const ERRNO_TOKEN = /\b(ENOENT|EACCES|EPERM|ENOTDIR|EISDIR|ELOOP|EIO)\b/;

const SUGGESTIONS: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.E_IO_ERROR]:
    'Check that the path exists and that every directory on it is readable.',
  [ErrorCode.E_INVALID_INPUT]:
    'Pass a path to a regular file or a directory that is listed by its parent.',
  [ErrorCode.E_ACCESS_DENIED]:
    'Use a path inside one of the allowed directories.',
  [ErrorCode.E_UNKNOWN]:
    'Retry the operation; if it keeps failing, check the server logs.',
};

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function classifyError(error: unknown): ErrorCode {
  if (error instanceof WalkError) return error.code;
  if (isNodeError(error)) {
    return NODE_ERROR_CODE_MAP[error.code ?? ''] ?? ErrorCode.E_UNKNOWN;
  }
  if (error instanceof Error || typeof error === 'string') {
    return ERRNO_TOKEN.test(messageOf(error))
      ? ErrorCode.E_IO_ERROR
      : ErrorCode.E_UNKNOWN;
  }
  return ErrorCode.E_UNKNOWN;
}

export function getSuggestion(code: ErrorCode): string {
  return SUGGESTIONS[code];
}

export function createDetailedError(
  error: unknown,
  path?: string,
  details?: Record<string, unknown>
): DetailedError {
  const code = classifyError(error);
  const resolvedPath = error instanceof WalkError ? (error.path ?? path) : path;
  const resolvedDetails =
    details ?? (error instanceof WalkError ? error.details : undefined);

  const detailed: DetailedError = {
    code,
    message: messageOf(error),
    suggestion: getSuggestion(code),
  };
  if (resolvedPath !== undefined) detailed.path = resolvedPath;
  if (resolvedDetails !== undefined) detailed.details = resolvedDetails;
  return detailed;
}

export function formatDetailedError(detailed: DetailedError): string {
  const location = detailed.path ? ` (${detailed.path})` : '';
  const lines = [`Error [${detailed.code}]: ${detailed.message}${location}`];
  if (detailed.suggestion) {
    lines.push(`Suggestion: ${detailed.suggestion}`);
  }
  return lines.join('\n');
}
