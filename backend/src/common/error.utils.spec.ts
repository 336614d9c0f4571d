import { runInNewContext } from 'node:vm';
import { errorMessage, toError } from './error.utils';

describe('error utils', () => {
  it('should keep an error from this realm', () => {
    const error = new Error('boom');
    expect(toError(error)).toBe(error);
  });

  it('should keep an error created in another realm', () => {
    const foreign: unknown = runInNewContext('new Error("from elsewhere")');

    expect(toError(foreign)?.message).toBe('from elsewhere');
    expect(errorMessage(foreign)).toBe('from elsewhere');
  });

  it('should stringify values that are not errors', () => {
    expect(toError('plain')).toBeUndefined();
    expect(errorMessage('plain')).toBe('plain');
  });
});
