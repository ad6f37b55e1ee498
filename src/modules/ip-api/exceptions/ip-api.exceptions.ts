export enum IpApiErrorType {
  TRANSPORT = 'transport',
  HTTP_STATUS = 'http_status',
  RATE_LIMIT = 'rate_limit',
  DESERIALIZATION = 'deserialization',
  INVALID_QUERY = 'invalid_query',
  PRIVATE_RANGE = 'private_range',
  RESERVED_RANGE = 'reserved_range',
  UNEXPECTED = 'unexpected',
}

/**
 * Base class of every error a lookup can fail with
 */
export class IpApiRequestError extends Error {
  constructor(
    message: string,
    public readonly type: IpApiErrorType,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IpApiRequestError';
  }
}

/**
 * The request never produced a response (connection, DNS or TLS failure),
 * or its body could not be read
 */
export class IpApiTransportError extends IpApiRequestError {
  constructor(message: string, cause?: unknown) {
    super(message, IpApiErrorType.TRANSPORT, { cause });
    this.name = 'IpApiTransportError';
  }
}

/**
 * The API answered with a non-success HTTP status
 */
export class IpApiHttpStatusError extends IpApiRequestError {
  constructor(
    public readonly status: number,
    message: string = `ip-api.com responded with HTTP ${status}`,
    type: IpApiErrorType = IpApiErrorType.HTTP_STATUS,
  ) {
    super(message, type);
    this.name = 'IpApiHttpStatusError';
  }
}

/**
 * ip-api.com allows 45 requests per minute per client IP on the free
 * endpoint (15 for batch). `retryAfterSeconds` comes from the `X-Ttl`
 * header and is undefined when the header is missing or malformed.
 */
export class IpApiRateLimitError extends IpApiHttpStatusError {
  constructor(public readonly retryAfterSeconds?: number) {
    super(
      429,
      retryAfterSeconds === undefined
        ? 'ip-api.com rate limit exceeded'
        : `ip-api.com rate limit exceeded, retry in ${retryAfterSeconds}s`,
      IpApiErrorType.RATE_LIMIT,
    );
    this.name = 'IpApiRateLimitError';
  }
}

/**
 * The body was not JSON, or not the shape of an IpData record (or list)
 */
export class IpApiDeserializationError extends IpApiRequestError {
  constructor(message: string, cause?: unknown) {
    super(message, IpApiErrorType.DESERIALIZATION, { cause });
    this.name = 'IpApiDeserializationError';
  }
}

export type IpApiQueryErrorType =
  | IpApiErrorType.INVALID_QUERY
  | IpApiErrorType.PRIVATE_RANGE
  | IpApiErrorType.RESERVED_RANGE
  | IpApiErrorType.UNEXPECTED;

/**
 * The API answered `status: "fail"` for a target
 */
export class IpApiQueryError extends IpApiRequestError {
  constructor(
    type: IpApiQueryErrorType,
    public readonly apiMessage: string | undefined,
    public readonly target: string | undefined,
  ) {
    super(
      `ip-api.com lookup failed${target ? ` for ${target}` : ''}: ${apiMessage ?? 'no message'}`,
      type,
    );
    this.name = 'IpApiQueryError';
  }
}

const QUERY_ERROR_TYPES: ReadonlyMap<string, IpApiQueryErrorType> = new Map<
  string,
  IpApiQueryErrorType
>([
  ['invalid query', IpApiErrorType.INVALID_QUERY],
  ['private range', IpApiErrorType.PRIVATE_RANGE],
  ['reserved range', IpApiErrorType.RESERVED_RANGE],
]);

/**
 * Map the `message` of a failed lookup to its error
 */
export function toQueryError(
  apiMessage: string | undefined,
  target?: string,
): IpApiQueryError {
  const type =
    (apiMessage !== undefined && QUERY_ERROR_TYPES.get(apiMessage)) ||
    IpApiErrorType.UNEXPECTED;
  return new IpApiQueryError(type, apiMessage, target);
}
