import { IpDataField } from './enums/ip-data-field.enum';
import { DEFAULT_LANGUAGE, IpApiLanguage } from './enums/ip-api-language.enum';
import {
  ALL_FIELDS,
  CONTROL_FIELDS_MASK,
  IP_DATA_FIELD_MASKS,
  MINIMUM_FIELDS,
} from './constants/ip-data-fields.constants';
import { IpApiQuery } from './interfaces/ip-api-query.interface';

/**
 * Selects which optional fields are requested from ip-api.com and in which
 * language. Requesting fewer fields keeps responses small.
 *
 * All methods mutate the config and return it, so calls can be chained:
 *
 * ```ts
 * const config = generateEmptyConfig()
 *   .include(IpDataField.Country, IpDataField.Currency)
 *   .setLanguage(IpApiLanguage.De);
 * ```
 */
export class IpApiConfig {
  private readonly fields: Set<IpDataField>;
  private language: IpApiLanguage;

  constructor(
    fields: Iterable<IpDataField> = [],
    language: IpApiLanguage = DEFAULT_LANGUAGE,
  ) {
    this.fields = new Set(fields);
    this.language = language;
  }

  /**
   * Add fields to the request. Fields already included stay included.
   */
  include(...fields: IpDataField[]): this {
    for (const field of fields) {
      this.fields.add(field);
    }
    return this;
  }

  /**
   * Remove fields from the request. Fields not included are ignored.
   */
  exclude(...fields: IpDataField[]): this {
    for (const field of fields) {
      this.fields.delete(field);
    }
    return this;
  }

  includes(field: IpDataField): boolean {
    return this.fields.has(field);
  }

  /**
   * Selected fields in declaration order
   */
  getFields(): IpDataField[] {
    return ALL_FIELDS.filter((field) => this.fields.has(field));
  }

  setLanguage(language: IpApiLanguage): this {
    this.language = language;
    return this;
  }

  getLanguage(): IpApiLanguage {
    return this.language;
  }

  clone(): IpApiConfig {
    return new IpApiConfig(this.fields, this.language);
  }

  /**
   * Serialize the selection into the `fields` and `lang` query parameters
   */
  toQuery(): IpApiQuery {
    let fields = CONTROL_FIELDS_MASK;
    for (const field of this.fields) {
      fields |= IP_DATA_FIELD_MASKS[field];
    }

    const query: IpApiQuery = { fields };
    if (this.language !== IpApiLanguage.En) {
      query.lang = this.language;
    }
    return query;
  }
}

/**
 * Config without any optional field, to build a selection from scratch
 */
export function generateEmptyConfig(): IpApiConfig {
  return new IpApiConfig();
}

/**
 * Config with the fields in {@link MINIMUM_FIELDS}
 */
export function generateMinimumConfig(): IpApiConfig {
  return new IpApiConfig(MINIMUM_FIELDS);
}

/**
 * Config with every available field
 */
export function generateMaximumConfig(): IpApiConfig {
  return new IpApiConfig(ALL_FIELDS);
}
