/**
 * Error taxonomy and reporting tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  CircularDependencyError,
  FileNotFoundError,
  IncludeIoError,
  PermissionDeniedError,
  formatErrorReport,
  handleError,
  toFileSystemError
} from '../../src/utils/errors.js';
import { ErrorCodes } from '../../src/types/index.js';

function errno(code: string, message = `${code}: failed`): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

describe('toFileSystemError', () => {
  const location = { sourceFile: '/scripts/main.sh', lineNumber: 2 };

  it('maps missing paths to FileNotFound', () => {
    for (const code of ['ENOENT', 'ENOTDIR']) {
      const error = toFileSystemError(errno(code), '/scripts/lib.sh', location);
      assert.ok(error instanceof FileNotFoundError);
      assert.equal(error.code, ErrorCodes.FILE_NOT_FOUND);
      assert.equal(error.message, 'File not found: /scripts/lib.sh (included from /scripts/main.sh:2)');
    }
  });

  it('maps access failures to PermissionDenied', () => {
    for (const code of ['EACCES', 'EPERM']) {
      const error = toFileSystemError(errno(code), '/scripts/lib.sh');
      assert.ok(error instanceof PermissionDeniedError);
      assert.equal(error.message, 'Permission denied: /scripts/lib.sh');
    }
  });

  it('maps everything else to IoError, keeping the cause', () => {
    const cause = errno('EIO', 'EIO: i/o error, read');
    const error = toFileSystemError(cause, '/scripts/lib.sh');
    assert.ok(error instanceof IncludeIoError);
    assert.equal(error.code, ErrorCodes.IO_ERROR);
    assert.equal(error.message, 'IO error on /scripts/lib.sh: EIO: i/o error, read');
    assert.equal(error.cause, cause);
  });

  it('passes preprocessor errors through', () => {
    const original = new FileNotFoundError('/scripts/lib.sh');
    assert.equal(toFileSystemError(original, '/other'), original);
  });
});

describe('formatErrorReport', () => {
  it('prints the message, include stack and causes', () => {
    const error = toFileSystemError(errno('EACCES', 'EACCES: permission denied, open'), '/s/lib.sh');
    error.attachIncludeStack(['/s/main.sh', '/s/mid.sh']);

    assert.equal(
      formatErrorReport(error),
      [
        'Error: Permission denied: /s/lib.sh',
        '  Include stack: /s/main.sh -> /s/mid.sh',
        '  Caused by: EACCES: permission denied, open'
      ].join('\n')
    );
  });

  it('keeps the first include stack attached', () => {
    const error = new CircularDependencyError(['/s/a.sh', '/s/b.sh', '/s/a.sh']);
    error.attachIncludeStack(['/s/a.sh', '/s/b.sh']);
    error.attachIncludeStack(['/s/a.sh']);
    assert.deepEqual(error.includeStack, ['/s/a.sh', '/s/b.sh']);
  });

  it('formats plain errors and other values', () => {
    assert.equal(formatErrorReport(new Error('plain')), 'Error: plain');
    assert.equal(formatErrorReport('text'), 'Error: text');
  });
});

describe('handleError', () => {
  it('turns errors into failed command results', () => {
    assert.deepEqual(handleError(new FileNotFoundError('/s/x.sh')), {
      success: false,
      error: 'Error: File not found: /s/x.sh'
    });
    assert.deepEqual(handleError(42), { success: false, error: 'An unknown error occurred' });
  });
});
