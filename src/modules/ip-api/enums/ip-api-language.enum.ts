/**
 * Response languages supported by ip-api.com.
 * Values are the `lang` query parameter codes.
 */
export enum IpApiLanguage {
  /** Deutsch (German) */
  De = 'de',
  /** English (default) */
  En = 'en',
  /** Español (Spanish) */
  Es = 'es',
  /** Français (French) */
  Fr = 'fr',
  /** 日本語 (Japanese) */
  Ja = 'ja',
  /** Português - Brasil (Portuguese - Brazil) */
  PtBr = 'pt-BR',
  /** Русский (Russian) */
  Ru = 'ru',
  /** 中国 (Chinese, simplified) */
  ZhCn = 'zh-CN',
}

export const DEFAULT_LANGUAGE = IpApiLanguage.En;
