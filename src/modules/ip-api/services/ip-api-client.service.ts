import { Inject, Injectable, Logger } from '@nestjs/common';
import ipApiConfig from '../../../config/ip-api.config';
import { IpData } from '../dto/ip-data.dto';
import { IpApiConfig } from '../ip-api-config';
import { IpApiClientOptions } from '../interfaces/ip-api-client-options.interface';
import {
  IpApiHttpStatusError,
  IpApiRateLimitError,
  IpApiTransportError,
} from '../exceptions/ip-api.exceptions';
import { buildRequestUrl } from '../utils/ip-api-url.util';
import {
  parseJsonBody,
  toIpData,
  toIpDataList,
} from '../utils/ip-api-response.parser';

/**
 * Executes lookups against ip-api.com (https://ip-api.com/docs/api:json).
 *
 * Every call serializes the given config when it starts, so changing the
 * config afterwards does not affect a request in flight. Nothing is retried
 * or cached.
 */
@Injectable()
export class IpApiClient {
  private readonly logger = new Logger(IpApiClient.name);

  constructor(
    @Inject(ipApiConfig.KEY)
    private readonly options: IpApiClientOptions,
  ) {}

  /**
   * Look up a single target.
   *
   * @param target - IPv4/IPv6 address, domain name, or an empty string to
   *   look up the caller's own public IP
   * @throws IpApiRequestError subclass on transport, HTTP, API or parsing failure
   */
  async makeRequest(config: IpApiConfig, target: string): Promise<IpData> {
    const query = config.toQuery();
    const url = buildRequestUrl(this.options, 'json', target, query);

    this.logger.debug(
      `Looking up ${target || 'own IP'} (fields=${query.fields})`,
    );

    try {
      const body = await this.send(url, { method: 'GET' });
      return toIpData(parseJsonBody(body), target);
    } catch (error) {
      this.logger.warn(
        `Lookup of ${target || 'own IP'} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }

  /**
   * Look up several IPv4/IPv6 addresses in one request.
   * Results come back in the order of `targets`.
   *
   * @throws IpApiRequestError subclass if the request or any entry fails
   */
  async makeBatchRequest(
    config: IpApiConfig,
    targets: readonly string[],
  ): Promise<IpData[]> {
    if (targets.length === 0) {
      return [];
    }

    const query = config.toQuery();
    const url = buildRequestUrl(this.options, 'batch', undefined, query);

    this.logger.debug(
      `Batch lookup of ${targets.length} targets (fields=${query.fields})`,
    );

    try {
      const body = await this.send(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(targets),
      });
      return toIpDataList(parseJsonBody(body), targets);
    } catch (error) {
      this.logger.warn(
        `Batch lookup of ${targets.length} targets failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }

  /**
   * Perform the HTTP call and return the raw body of a successful response
   */
  private async send(url: string, init: RequestInit): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      throw new IpApiTransportError(
        `Request to ip-api.com failed: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }

    if (!response.ok) {
      // release the connection, the body of a failed response is not read
      await response.body?.cancel();

      if (response.status === 429) {
        throw new IpApiRateLimitError(parseTtl(response.headers.get('X-Ttl')));
      }
      throw new IpApiHttpStatusError(response.status);
    }

    try {
      return await response.text();
    } catch (error) {
      throw new IpApiTransportError(
        'Failed to read response body from ip-api.com',
        error,
      );
    }
  }
}

/**
 * Seconds until the rate limit window resets
 */
function parseTtl(header: string | null): number | undefined {
  if (header === null || !/^\d+$/.test(header.trim())) {
    return undefined;
  }
  return parseInt(header, 10);
}
