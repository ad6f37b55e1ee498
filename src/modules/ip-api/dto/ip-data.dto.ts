import { Expose } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNumber,
  IsString,
  ValidateIf,
} from 'class-validator';

/**
 * Skips validation only when the key is missing. Unlike `@IsOptional()`,
 * a `null` still has to pass the type check, so it is rejected.
 */
function IsOmittable(): PropertyDecorator {
  return ValidateIf((_object: object, value: unknown) => value !== undefined);
}

/**
 * Lookup result for one target. A field is only present when it was
 * requested and the API returned it, so every field is optional.
 *
 * Example for 1.1.1.1 with every field requested:
 *
 * ```json
 * {
 *   "continent": "Oceania", "continentCode": "OC",
 *   "country": "Australia", "countryCode": "AU",
 *   "region": "QLD", "regionName": "Queensland",
 *   "city": "South Brisbane", "district": "", "zip": "4101",
 *   "lat": -27.4766, "lon": 153.0166,
 *   "timezone": "Australia/Brisbane", "offset": 36000, "currency": "AUD",
 *   "isp": "Cloudflare, Inc", "org": "APNIC and Cloudflare DNS Resolver project",
 *   "as": "AS13335 Cloudflare, Inc.", "asname": "CLOUDFLARENET",
 *   "reverse": "one.one.one.one",
 *   "mobile": false, "proxy": false, "hosting": true,
 *   "query": "1.1.1.1"
 * }
 * ```
 */
export class IpData {
  /** Continent name */
  @Expose()
  @IsOmittable()
  @IsString()
  continent?: string;

  /** Two-letter continent code */
  @Expose()
  @IsOmittable()
  @IsString()
  continentCode?: string;

  /** Country name */
  @Expose()
  @IsOmittable()
  @IsString()
  country?: string;

  /** ISO 3166-1 alpha-2 country code */
  @Expose()
  @IsOmittable()
  @IsString()
  countryCode?: string;

  /** Region/state short code (FIPS or ISO) */
  @Expose()
  @IsOmittable()
  @IsString()
  region?: string;

  @Expose()
  @IsOmittable()
  @IsString()
  regionName?: string;

  @Expose()
  @IsOmittable()
  @IsString()
  city?: string;

  /** Subdivision of the city */
  @Expose()
  @IsOmittable()
  @IsString()
  district?: string;

  @Expose()
  @IsOmittable()
  @IsString()
  zip?: string;

  @Expose()
  @IsOmittable()
  @IsNumber()
  lat?: number;

  @Expose()
  @IsOmittable()
  @IsNumber()
  lon?: number;

  /** IANA time zone name */
  @Expose()
  @IsOmittable()
  @IsString()
  timezone?: string;

  /** UTC offset in seconds, DST included */
  @Expose()
  @IsOmittable()
  @IsInt()
  offset?: number;

  /** National currency */
  @Expose()
  @IsOmittable()
  @IsString()
  currency?: string;

  @Expose()
  @IsOmittable()
  @IsString()
  isp?: string;

  /** Organization name */
  @Expose()
  @IsOmittable()
  @IsString()
  org?: string;

  /**
   * AS number and organization, separated by a space (RIR).
   * Empty for IP blocks not announced in BGP tables.
   */
  @Expose()
  @IsOmittable()
  @IsString()
  as?: string;

  /** AS name (RIR) */
  @Expose()
  @IsOmittable()
  @IsString()
  asname?: string;

  /** Reverse DNS of the IP. Requesting it can delay the response. */
  @Expose()
  @IsOmittable()
  @IsString()
  reverse?: string;

  /** Mobile (cellular) connection */
  @Expose()
  @IsOmittable()
  @IsBoolean()
  mobile?: boolean;

  /** Proxy, VPN or Tor exit address */
  @Expose()
  @IsOmittable()
  @IsBoolean()
  proxy?: boolean;

  /** Hosting, colocated or data center */
  @Expose()
  @IsOmittable()
  @IsBoolean()
  hosting?: boolean;

  /** IP or domain used for the lookup */
  @Expose()
  @IsOmittable()
  @IsString()
  query?: string;
}
