import type { z } from 'zod';

import {
  createDetailedError,
  ErrorCode,
  formatDetailedError,
  getSuggestion,
} from '../lib/errors.js';
import type { ErrorSchema } from '../schemas/common.js';

interface TextContent {
  type: 'text';
  text: string;
}

type ToolError = z.infer<typeof ErrorSchema>;

// Type aliases rather than interfaces: the SDK result type carries an index
// signature that interfaces do not satisfy.
export type ToolResponse<T> = {
  content: TextContent[];
  structuredContent: T;
};

export type ToolErrorResponse = {
  content: TextContent[];
  structuredContent: { ok: false; error: ToolError };
  isError: true;
};

export type ToolResult<T> = ToolResponse<T> | ToolErrorResponse;

export function buildToolResponse<T>(
  text: string,
  structuredContent: T
): ToolResponse<T> {
  return {
    content: [{ type: 'text', text }],
    structuredContent,
  };
}

// Errors that cannot be classified take the tool's own fallback code.
export function buildToolErrorResponse(
  error: unknown,
  fallbackCode: ErrorCode,
  path?: string
): ToolErrorResponse {
  const detailed = createDetailedError(error, path);
  if (detailed.code === ErrorCode.E_UNKNOWN) {
    detailed.code = fallbackCode;
    detailed.suggestion = getSuggestion(fallbackCode);
  }

  return {
    content: [{ type: 'text', text: formatDetailedError(detailed) }],
    structuredContent: {
      ok: false,
      error: {
        code: detailed.code,
        message: detailed.message,
        path: detailed.path,
        suggestion: detailed.suggestion,
      },
    },
    isError: true,
  };
}

/**
 * Runs a synchronous walk handler and turns anything it throws into a tool
 * error attributed to `path`.
 */
export function runWalkTool<T>(
  path: string,
  run: () => ToolResponse<T>
): ToolResult<T> {
  try {
    return run();
  } catch (error: unknown) {
    return buildToolErrorResponse(error, ErrorCode.E_IO_ERROR, path);
  }
}
