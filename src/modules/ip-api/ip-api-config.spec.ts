import {
  IpApiConfig,
  generateEmptyConfig,
  generateMaximumConfig,
  generateMinimumConfig,
} from './ip-api-config';
import { IpDataField } from './enums/ip-data-field.enum';
import { IpApiLanguage } from './enums/ip-api-language.enum';
import { ALL_FIELDS } from './constants/ip-data-fields.constants';

describe('IpApiConfig', () => {
  describe('presets', () => {
    it('should start the empty config without fields and in English', () => {
      const config = generateEmptyConfig();

      expect(config.getFields()).toEqual([]);
      expect(config.getLanguage()).toBe(IpApiLanguage.En);
      expect(config.toQuery()).toEqual({ fields: 49152 });
    });

    it('should select the documented minimum fields', () => {
      const config = generateMinimumConfig();

      expect(config.getFields()).toEqual([
        IpDataField.Country,
        IpDataField.Region,
        IpDataField.City,
        IpDataField.Lat,
        IpDataField.Lon,
        IpDataField.Isp,
      ]);
      expect(config.toQuery()).toEqual({ fields: 49877 });
    });

    it('should select every field in the maximum config', () => {
      const config = generateMaximumConfig();

      expect(config.getFields()).toEqual(ALL_FIELDS);
      expect(config.getFields()).toHaveLength(23);
      expect(config.toQuery()).toEqual({ fields: 66846719 });
    });

    it('should return independent configs on every call', () => {
      const first = generateEmptyConfig().include(IpDataField.Country);
      const second = generateEmptyConfig();

      expect(first.includes(IpDataField.Country)).toBe(true);
      expect(second.includes(IpDataField.Country)).toBe(false);
    });
  });

  describe('include / exclude', () => {
    it('should request exactly country and currency', () => {
      const config = generateEmptyConfig()
        .include(IpDataField.Country)
        .include(IpDataField.Currency);

      expect(config.getFields()).toEqual([
        IpDataField.Country,
        IpDataField.Currency,
      ]);
      expect(config.toQuery()).toEqual({ fields: 8437761 });
    });

    it('should accept several fields at once', () => {
      const config = generateEmptyConfig().include(
        IpDataField.As,
        IpDataField.Asname,
      );

      expect(config.getFields()).toEqual([IpDataField.As, IpDataField.Asname]);
    });

    it('should be a no-op to include an included field', () => {
      const config = generateEmptyConfig()
        .include(IpDataField.Isp)
        .include(IpDataField.Isp);

      expect(config.getFields()).toEqual([IpDataField.Isp]);
      expect(config.toQuery().fields).toBe(49152 + 512);
    });

    it('should be a no-op to exclude a missing field', () => {
      const config = generateEmptyConfig().exclude(IpDataField.Hosting);

      expect(config.getFields()).toEqual([]);
    });

    it('should drop a field from a preset', () => {
      const config = generateMinimumConfig().exclude(IpDataField.Isp);

      expect(config.includes(IpDataField.Isp)).toBe(false);
      expect(config.toQuery().fields).toBe(49877 - 512);
    });

    it('should keep the state of the last call', () => {
      const config = generateEmptyConfig()
        .include(IpDataField.Proxy)
        .exclude(IpDataField.Proxy);
      expect(config.includes(IpDataField.Proxy)).toBe(false);

      config.exclude(IpDataField.Mobile).include(IpDataField.Mobile);
      expect(config.includes(IpDataField.Mobile)).toBe(true);
    });

    it('should return the same instance for chaining', () => {
      const config = generateEmptyConfig();

      expect(config.include(IpDataField.Zip)).toBe(config);
      expect(config.exclude(IpDataField.Zip)).toBe(config);
      expect(config.setLanguage(IpApiLanguage.Fr)).toBe(config);
    });
  });

  describe('setLanguage', () => {
    it('should not send the lang parameter for English', () => {
      const config = generateEmptyConfig().setLanguage(IpApiLanguage.En);

      expect(config.toQuery()).toEqual({ fields: 49152 });
    });

    it('should use the last language set', () => {
      const config = generateEmptyConfig()
        .setLanguage(IpApiLanguage.De)
        .setLanguage(IpApiLanguage.En);

      expect(config.getLanguage()).toBe(IpApiLanguage.En);
      expect(config.toQuery().lang).toBeUndefined();
    });

    it.each([
      [IpApiLanguage.De, 'de'],
      [IpApiLanguage.Es, 'es'],
      [IpApiLanguage.Fr, 'fr'],
      [IpApiLanguage.Ja, 'ja'],
      [IpApiLanguage.PtBr, 'pt-BR'],
      [IpApiLanguage.Ru, 'ru'],
      [IpApiLanguage.ZhCn, 'zh-CN'],
    ])('should send %s as lang=%s', (language, code) => {
      const config = generateEmptyConfig().setLanguage(language);

      expect(config.toQuery()).toEqual({ fields: 49152, lang: code });
    });
  });

  describe('clone', () => {
    it('should copy fields and language without sharing state', () => {
      const original = new IpApiConfig(
        [IpDataField.City],
        IpApiLanguage.Ja,
      );
      const copy = original.clone().include(IpDataField.Zip);

      expect(copy.getLanguage()).toBe(IpApiLanguage.Ja);
      expect(copy.getFields()).toEqual([IpDataField.City, IpDataField.Zip]);
      expect(original.getFields()).toEqual([IpDataField.City]);
    });
  });
});
