import {
  IpApiErrorType,
  IpApiHttpStatusError,
  IpApiQueryError,
  IpApiRateLimitError,
  IpApiRequestError,
  IpApiTransportError,
  toQueryError,
} from './ip-api.exceptions';

describe('ip-api exceptions', () => {
  it('should expose the retry delay on rate limit errors', () => {
    const error = new IpApiRateLimitError(42);

    expect(error).toBeInstanceOf(IpApiHttpStatusError);
    expect(error).toBeInstanceOf(IpApiRequestError);
    expect(error.status).toBe(429);
    expect(error.type).toBe(IpApiErrorType.RATE_LIMIT);
    expect(error.retryAfterSeconds).toBe(42);
    expect(error.message).toBe(
      'ip-api.com rate limit exceeded, retry in 42s',
    );
  });

  it('should describe a rate limit without a known delay', () => {
    const error = new IpApiRateLimitError();

    expect(error.retryAfterSeconds).toBeUndefined();
    expect(error.message).toBe('ip-api.com rate limit exceeded');
  });

  it('should keep the cause of transport errors', () => {
    const cause = new TypeError('fetch failed');
    const error = new IpApiTransportError('Request failed', cause);

    expect(error.cause).toBe(cause);
    expect(error.type).toBe(IpApiErrorType.TRANSPORT);
    expect(error.name).toBe('IpApiTransportError');
  });

  describe('toQueryError', () => {
    it('should map known API messages', () => {
      expect(toQueryError('private range').type).toBe(
        IpApiErrorType.PRIVATE_RANGE,
      );
    });

    it('should fall back to unexpected for unknown messages', () => {
      const error = toQueryError('constructor', 'example.com');

      expect(error).toBeInstanceOf(IpApiQueryError);
      expect(error.type).toBe(IpApiErrorType.UNEXPECTED);
      expect(error.message).toBe(
        'ip-api.com lookup failed for example.com: constructor',
      );
    });

    it('should handle a missing message', () => {
      const error = toQueryError(undefined);

      expect(error.type).toBe(IpApiErrorType.UNEXPECTED);
      expect(error.message).toBe('ip-api.com lookup failed: no message');
    });
  });
});
