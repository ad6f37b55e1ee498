import { IpDataField } from '../enums/ip-data-field.enum';

/**
 * Bit of each field in the numeric `fields` query parameter
 * (see https://ip-api.com/docs/api:json).
 */
export const IP_DATA_FIELD_MASKS: Readonly<Record<IpDataField, number>> = {
  [IpDataField.Country]: 1 << 0,
  [IpDataField.CountryCode]: 1 << 1,
  [IpDataField.Region]: 1 << 2,
  [IpDataField.RegionName]: 1 << 3,
  [IpDataField.City]: 1 << 4,
  [IpDataField.Zip]: 1 << 5,
  [IpDataField.Lat]: 1 << 6,
  [IpDataField.Lon]: 1 << 7,
  [IpDataField.Timezone]: 1 << 8,
  [IpDataField.Isp]: 1 << 9,
  [IpDataField.Org]: 1 << 10,
  [IpDataField.As]: 1 << 11,
  [IpDataField.Reverse]: 1 << 12,
  [IpDataField.Query]: 1 << 13,
  [IpDataField.Mobile]: 1 << 16,
  [IpDataField.Proxy]: 1 << 17,
  [IpDataField.District]: 1 << 19,
  [IpDataField.Continent]: 1 << 20,
  [IpDataField.ContinentCode]: 1 << 21,
  [IpDataField.Asname]: 1 << 22,
  [IpDataField.Currency]: 1 << 23,
  [IpDataField.Hosting]: 1 << 24,
  [IpDataField.Offset]: 1 << 25,
};

/**
 * `status` and `message` are requested on every call so failed lookups can
 * be told apart from successful ones. They never end up on an IpData record.
 */
export const STATUS_FIELD_MASK = 1 << 14;
export const MESSAGE_FIELD_MASK = 1 << 15;
export const CONTROL_FIELDS_MASK = STATUS_FIELD_MASK | MESSAGE_FIELD_MASK;

/**
 * Every selectable field, in declaration order
 */
export const ALL_FIELDS: readonly IpDataField[] = Object.values(IpDataField);

/**
 * Fields of the minimum preset: location down to city level plus the ISP
 */
export const MINIMUM_FIELDS: readonly IpDataField[] = [
  IpDataField.Country,
  IpDataField.Region,
  IpDataField.City,
  IpDataField.Lat,
  IpDataField.Lon,
  IpDataField.Isp,
];
