import { expect, it } from 'vitest';

import {
  classifyError,
  createDetailedError,
  ErrorCode,
  formatDetailedError,
  getSuggestion,
  isNodeError,
  NODE_ERROR_CODE_MAP,
  WalkError,
} from '../../lib/errors.js';

function nodeError(code: string, message = code): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

it('isNodeError accepts errors carrying a string code', () => {
  expect(isNodeError(nodeError('ENOENT'))).toBe(true);
  expect(isNodeError(new Error('plain'))).toBe(false);
  expect(isNodeError({ code: 'ENOENT' })).toBe(false);
  expect(isNodeError(Object.assign(new Error('x'), { code: 2 }))).toBe(false);
});

it('NODE_ERROR_CODE_MAP sends filesystem errnos to E_IO_ERROR', () => {
  for (const errno of ['ENOENT', 'EACCES', 'EPERM', 'ENOTDIR', 'ELOOP']) {
    expect(NODE_ERROR_CODE_MAP[errno]).toBe(ErrorCode.E_IO_ERROR);
  }
  expect(NODE_ERROR_CODE_MAP.EINVAL).toBe(ErrorCode.E_INVALID_INPUT);
});

it('classifyError keeps the code of a WalkError', () => {
  const error = new WalkError(ErrorCode.E_ACCESS_DENIED, 'denied', '/x');
  expect(classifyError(error)).toBe(ErrorCode.E_ACCESS_DENIED);
});

it('classifyError maps Node.js error codes', () => {
  expect(classifyError(nodeError('EACCES'))).toBe(ErrorCode.E_IO_ERROR);
  expect(classifyError(nodeError('EINVAL'))).toBe(ErrorCode.E_INVALID_INPUT);
  expect(classifyError(nodeError('EWHATEVER'))).toBe(ErrorCode.E_UNKNOWN);
});

it('classifyError falls back to errno tokens in messages', () => {
  expect(classifyError(new Error('ENOENT: no such file'))).toBe(
    ErrorCode.E_IO_ERROR
  );
  expect(classifyError('EACCES while reading')).toBe(ErrorCode.E_IO_ERROR);
  expect(classifyError(new Error('Something else'))).toBe(ErrorCode.E_UNKNOWN);
  expect(classifyError({ message: 'ENOENT' })).toBe(ErrorCode.E_UNKNOWN);
});

it('WalkError.fromError keeps the cause and its errno', () => {
  const cause = nodeError('ENOENT', 'ENOENT: no such file or directory');
  const error = WalkError.fromError(
    ErrorCode.E_IO_ERROR,
    'Cannot read directory: /gone',
    cause,
    '/gone'
  );
  expect(error.name).toBe('WalkError');
  expect(error.cause).toBe(cause);
  expect(error.details).toEqual({ errno: 'ENOENT' });
  expect(error.path).toBe('/gone');
  expect(error.stack).toContain('Caused by:');
});

it('createDetailedError prefers the path carried by a WalkError', () => {
  const error = new WalkError(ErrorCode.E_IO_ERROR, 'boom', '/inner', {
    errno: 'EIO',
  });
  expect(createDetailedError(error, '/outer')).toEqual({
    code: ErrorCode.E_IO_ERROR,
    message: 'boom',
    path: '/inner',
    suggestion: getSuggestion(ErrorCode.E_IO_ERROR),
    details: { errno: 'EIO' },
  });
});

it('createDetailedError uses the given path and details for other errors', () => {
  const detailed = createDetailedError(new Error('odd'), '/p', { extra: 1 });
  expect(detailed).toEqual({
    code: ErrorCode.E_UNKNOWN,
    message: 'odd',
    path: '/p',
    suggestion: getSuggestion(ErrorCode.E_UNKNOWN),
    details: { extra: 1 },
  });
});

it('formatDetailedError renders code, message, path and suggestion', () => {
  const text = formatDetailedError({
    code: ErrorCode.E_INVALID_INPUT,
    message: 'Bad root',
    path: '/dev/null',
    suggestion: 'Use a directory',
  });
  expect(text).toBe(
    'Error [E_INVALID_INPUT]: Bad root (/dev/null)\nSuggestion: Use a directory'
  );
});

it('formatDetailedError omits missing parts', () => {
  expect(
    formatDetailedError({ code: ErrorCode.E_UNKNOWN, message: 'Oops' })
  ).toBe('Error [E_UNKNOWN]: Oops');
});
