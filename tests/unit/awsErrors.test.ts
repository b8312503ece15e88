import { isCredentialsError, isNetworkError } from '@/utils/awsErrors';

describe('AWS error classification (unit)', () => {
  it.each(['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET'])(
    'treats %s as a network error',
    (code) => {
      expect(isNetworkError(Object.assign(new Error(code), { code }))).toBe(true);
    }
  );

  it('treats SDK timeouts as network errors', () => {
    expect(isNetworkError(Object.assign(new Error('timed out'), { name: 'TimeoutError' }))).toBe(true);
  });

  it('does not treat other errors as network errors', () => {
    expect(isNetworkError(new Error('boom'))).toBe(false);
    expect(isNetworkError('ECONNREFUSED')).toBe(false);
  });

  it('recognizes credential provider failures', () => {
    const error = Object.assign(new Error('Could not load credentials'), {
      name: 'CredentialsProviderError',
    });

    expect(isCredentialsError(error)).toBe(true);
    expect(isCredentialsError(new Error('boom'))).toBe(false);
  });
});
