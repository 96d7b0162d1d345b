import { runInNewContext } from 'vm';
import { BackendCallError, describeError, errorCode } from './errors';

describe('describeError', () => {
  it('should read the message of errors created in another context', () => {
    const foreign: unknown = runInNewContext('new Error("ENOENT: no such file")');

    expect(foreign instanceof Error).toBe(false);
    expect(describeError(foreign)).toBe('ENOENT: no such file');
  });

  it('should pass strings through and fall back for anything else', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('Unknown error');
    expect(describeError({ message: 7 })).toBe('Unknown error');
  });
});

describe('errorCode', () => {
  it('should read a string code off any object', () => {
    const foreign: unknown = runInNewContext('Object.assign(new Error("missing"), { code: "ENOENT" })');

    expect(errorCode(foreign)).toBe('ENOENT');
    expect(errorCode(new Error('no code'))).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});

describe('BackendCallError', () => {
  it('should describe the host, attempt and cause', () => {
    const error = new BackendCallError('http://a:11434', 2, new Error('socket hang up'));

    expect(error.name).toBe('BackendCallError');
    expect(error.code).toBe('BACKEND_CALL_FAILED');
    expect(error.message).toBe('Backend call to http://a:11434 failed on attempt 2: socket hang up');
  });
});
