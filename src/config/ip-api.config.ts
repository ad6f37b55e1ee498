import { registerAs } from '@nestjs/config';
import { IpApiClientOptions } from '../modules/ip-api/interfaces/ip-api-client-options.interface';

export const FREE_BASE_URL = 'http://ip-api.com';

/**
 * The pro endpoint is the only one served over HTTPS
 */
export const PRO_BASE_URL = 'https://pro.ip-api.com';

/**
 * ip-api.com client configuration
 */
export default registerAs('ipApi', (): IpApiClientOptions => {
  /**
   * Optional pro key. Without it the free endpoint is used.
   */
  const apiKey = process.env.IP_API_KEY || undefined;

  return {
    /**
     * Override the API root, e.g. to point at a proxy
     * Default: the pro endpoint when a key is set, the free one otherwise
     */
    baseUrl:
      process.env.IP_API_BASE_URL || (apiKey ? PRO_BASE_URL : FREE_BASE_URL),
    apiKey,
  };
});
