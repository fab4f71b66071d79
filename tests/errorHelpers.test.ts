import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  FileNotFoundError,
  IOError,
  formatCliError,
  getErrorDetails,
  getErrorMessage,
  toFileError,
} from '../src/errorHelpers.js';

function nodeError(code: string, message: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe('toFileError', () => {
  it('maps a missing file on read to FileNotFound', () => {
    const error = toFileError(nodeError('ENOENT', 'no such file'), '/in.md', 'read');
    expect(error).toBeInstanceOf(FileNotFoundError);
    expect(error.kind).toBe('FileNotFound');
    expect(error.message).toBe('File not found: /in.md');
  });

  it('maps a missing directory on write to IOError', () => {
    const error = toFileError(nodeError('ENOENT', 'no such directory'), '/out/x.docx', 'write');
    expect(error).toBeInstanceOf(IOError);
    expect(error.message).toBe('Cannot write /out/x.docx: no such directory');
  });

  it('maps permission errors to IOError and keeps the cause', () => {
    const cause = nodeError('EACCES', 'permission denied');
    const error = toFileError(cause, '/in.md', 'read');
    expect(error.kind).toBe('IOError');
    expect(error.cause).toBe(cause);
  });

  it('passes conversion errors through', () => {
    const original = new ConfigError('bad');
    expect(toFileError(original, '/x', 'read')).toBe(original);
  });
});

describe('error formatting', () => {
  it('reads messages from anything thrown', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage({ message: 'object' })).toBe('object');
    expect(getErrorMessage('text')).toBe('text');
  });

  it('formats errors for the command line', () => {
    expect(formatCliError(new FileNotFoundError('/a.md'))).toBe('Error: File not found: /a.md');
  });

  it('includes the kind and cause in details', () => {
    const error = new IOError('Cannot read /a.md', { cause: new Error('EIO') });
    expect(getErrorDetails(error)).toEqual({ kind: 'IOError', message: 'Cannot read /a.md', cause: 'EIO' });
    expect(getErrorDetails(new Error('plain'))).toEqual({ message: 'plain' });
  });
});
