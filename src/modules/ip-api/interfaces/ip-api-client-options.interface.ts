export interface IpApiClientOptions {
  /**
   * API root, without the `/json` or `/batch` resource
   */
  baseUrl: string;

  /**
   * ip-api.com pro key, sent as the `key` query parameter
   */
  apiKey?: string;
}
