import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { IpData } from '../dto/ip-data.dto';
import {
  IpApiDeserializationError,
  toQueryError,
} from '../exceptions/ip-api.exceptions';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((error) =>
      Object.values(error.constraints ?? {}).join(', ') || error.property,
    )
    .join('; ');
}

export function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new IpApiDeserializationError(
      'Response body is not valid JSON',
      error,
    );
  }
}

/**
 * Throws the matching IpApiQueryError when the API reported a failed lookup.
 * A `message` without a `status` is treated as a failure too.
 */
function assertLookupSucceeded(value: JsonObject, target?: string): void {
  const { status, message } = value;
  if (status === 'fail' || (status === undefined && message !== undefined)) {
    throw toQueryError(
      typeof message === 'string' ? message : undefined,
      target,
    );
  }
}

/**
 * Turn one decoded response object into an IpData record.
 * Unknown keys (including `status` and `message`) are dropped; fields the
 * API did not return stay absent.
 */
export function toIpData(value: unknown, target?: string): IpData {
  if (!isJsonObject(value)) {
    throw new IpApiDeserializationError(
      `Expected a JSON object, got ${describeValue(value)}`,
    );
  }

  assertLookupSucceeded(value, target);

  const record = plainToInstance(IpData, value, {
    excludeExtraneousValues: true,
    exposeUnsetFields: false,
  });

  const errors = validateSync(record);
  if (errors.length > 0) {
    throw new IpApiDeserializationError(
      `Unexpected response shape: ${formatValidationErrors(errors)}`,
    );
  }

  return record;
}

/**
 * Turn a decoded batch response into records matching `targets` one to one.
 * Fails as a whole when any entry fails.
 */
export function toIpDataList(
  value: unknown,
  targets: readonly string[],
): IpData[] {
  if (!Array.isArray(value)) {
    throw new IpApiDeserializationError(
      `Expected a JSON array, got ${describeValue(value)}`,
    );
  }

  if (value.length !== targets.length) {
    throw new IpApiDeserializationError(
      `Expected ${targets.length} results, got ${value.length}`,
    );
  }

  return value.map((item: unknown, index) => toIpData(item, targets[index]));
}
