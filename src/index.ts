import 'reflect-metadata';

export {
  default as ipApiConfig,
  FREE_BASE_URL,
  PRO_BASE_URL,
} from './config/ip-api.config';
export { IpApiModule } from './modules/ip-api/ip-api.module';
export { IpApiClient } from './modules/ip-api/services/ip-api-client.service';
export {
  IpApiConfig,
  generateEmptyConfig,
  generateMaximumConfig,
  generateMinimumConfig,
} from './modules/ip-api/ip-api-config';
export { IpData } from './modules/ip-api/dto/ip-data.dto';
export { IpDataField } from './modules/ip-api/enums/ip-data-field.enum';
export {
  DEFAULT_LANGUAGE,
  IpApiLanguage,
} from './modules/ip-api/enums/ip-api-language.enum';
export {
  ALL_FIELDS,
  IP_DATA_FIELD_MASKS,
  MINIMUM_FIELDS,
} from './modules/ip-api/constants/ip-data-fields.constants';
export {
  IpApiDeserializationError,
  IpApiErrorType,
  IpApiHttpStatusError,
  IpApiQueryError,
  IpApiRateLimitError,
  IpApiRequestError,
  IpApiTransportError,
} from './modules/ip-api/exceptions/ip-api.exceptions';
export type { IpApiQueryErrorType } from './modules/ip-api/exceptions/ip-api.exceptions';
export type { IpApiClientOptions } from './modules/ip-api/interfaces/ip-api-client-options.interface';
export type { IpApiQuery } from './modules/ip-api/interfaces/ip-api-query.interface';
