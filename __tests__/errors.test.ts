import * as vm from 'vm';
import { DocumentNotFoundError, IngestionError, errorCode, errorMessage } from '../utils/errors';

describe('error helpers', () => {
  // Built in a separate context, the way Jest's sandbox sees errors from node core
  const foreignError: unknown = vm.runInNewContext("const e = new Error('no such file'); e.code = 'ENOENT'; e");

  it('should not rely on instanceof for errors from another realm', () => {
    expect(foreignError instanceof Error).toBe(false);
    expect(errorMessage(foreignError)).toBe('no such file');
    expect(errorCode(foreignError)).toBe('ENOENT');
  });

  it('should read message and code from local errors', () => {
    const error = new DocumentNotFoundError('/uploads/missing.pdf');

    expect(error).toBeInstanceOf(IngestionError);
    expect(error.name).toBe('DocumentNotFoundError');
    expect(errorMessage(error)).toBe('Document not found: /uploads/missing.pdf');
    expect(errorCode(error)).toBe('NOT_FOUND');
  });

  it('should handle values that are not errors', () => {
    expect(errorMessage('timed out')).toBe('timed out');
    expect(errorMessage(42)).toBe('Unknown error');
    expect(errorMessage(null)).toBe('Unknown error');
    expect(errorCode({ code: 5 })).toBeUndefined();
  });
});
