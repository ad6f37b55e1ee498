/**
 * Optional response fields that can be requested from ip-api.com.
 * Each value is the key the field has in the JSON response.
 */
export enum IpDataField {
  Continent = 'continent',
  ContinentCode = 'continentCode',
  Country = 'country',
  CountryCode = 'countryCode',
  Region = 'region',
  RegionName = 'regionName',
  City = 'city',
  District = 'district',
  Zip = 'zip',
  Lat = 'lat',
  Lon = 'lon',
  Timezone = 'timezone',
  Offset = 'offset',
  Currency = 'currency',
  Isp = 'isp',
  Org = 'org',
  As = 'as',
  Asname = 'asname',
  Reverse = 'reverse',
  Mobile = 'mobile',
  Proxy = 'proxy',
  Hosting = 'hosting',
  Query = 'query',
}
