import type { I18nLogger } from "../logging/logger.js";
import type { Language } from "./language.js";
import type { GetTextOptions, LanguageTextOptions, LocaleCode } from "./types.js";
import { I18nOptionsSchema, type I18nDefaults, type I18nDefaultsInput } from "../config/config.js";
import { getChildLogger } from "../logging/logger.js";
import {
  InvalidFallbackError,
  InvalidLocaleError,
  InvalidTranslationKeyError,
  isI18nError,
} from "./errors.js";
import { matchLocale } from "./locale.js";

export type I18nOptions = I18nDefaultsInput & {
  /** Receives fallback diagnostics; defaults to the "i18n" child logger */
  logger?: I18nLogger;
};

/**
 * Locale-indexed translation resolver with a single fallback locale.
 *
 * Usage:
 *   const i18n = new I18n([en, pt], "en");
 *
 *   i18n.getText("greeting.hello", "pt", { params: { name: "Ana" } });
 *   // => "Olá, Ana!"
 *
 *   // Keys missing in "pt" are served from "en"
 *   i18n.getText("only.in.english", "pt");
 */
export class I18n {
  readonly fallback: LocaleCode;
  protected readonly languageMap: Map<LocaleCode, Language>;
  protected readonly defaults: I18nDefaults;
  protected readonly log: I18nLogger;

  /**
   * @param fallback - Locale code, or index into `languages`
   * @throws InvalidFallbackError when the fallback names no registered language
   */
  constructor(languages: Iterable<Language>, fallback: LocaleCode | number, options: I18nOptions = {}) {
    const list = [...languages];
    this.languageMap = new Map(list.map((language) => [language.code, language]));

    const { logger, ...defaults } = options;
    this.defaults = I18nOptionsSchema.parse(defaults);
    this.log = logger ?? getChildLogger({ subsystem: "i18n" });

    const code = typeof fallback === "number" ? fallbackByIndex(list, fallback) : fallback;
    if (code === undefined || !this.languageMap.has(code)) {
      throw new InvalidFallbackError(fallback);
    }
    this.fallback = code;
  }

  get languages(): Language[] {
    return [...this.languageMap.values()];
  }

  get locales(): LocaleCode[] {
    return [...this.languageMap.keys()];
  }

  /**
   * The registered code serving a requested locale (exact, normalized, or
   * language prefix match)
   */
  resolveLocale(locale: string): LocaleCode | undefined {
    return matchLocale(locale, this.languageMap.keys());
  }

  getLanguage(locale: string): Language | undefined {
    const code = this.resolveLocale(locale);
    return code === undefined ? undefined : this.languageMap.get(code);
  }

  hasLocale(locale: string): boolean {
    return this.resolveLocale(locale) !== undefined;
  }

  /**
   * Locale used when a call does not name one
   */
  protected defaultLocale(): LocaleCode {
    return this.fallback;
  }

  /**
   * Get a translated and formatted string.
   *
   * Resolution: requested locale, then the fallback locale (when
   * `shouldFallback`), then `defaultValue`. Past that, the call throws when
   * `raiseOnEmpty` is on and otherwise logs a warning and returns "".
   *
   * @throws InvalidLocaleError when the locale is unknown and `shouldFallback` is off
   * @throws InvalidTranslationKeyError when nothing resolves and `raiseOnEmpty` is on
   */
  getText(key: string, locale?: LocaleCode, options: GetTextOptions = {}): string {
    const shouldFallback = options.shouldFallback ?? this.defaults.shouldFallback;
    const raiseOnEmpty = options.raiseOnEmpty ?? this.defaults.raiseOnEmpty;
    const requested = locale || this.defaultLocale();

    let code = this.resolveLocale(requested);
    if (code === undefined) {
      if (!shouldFallback) {
        throw new InvalidLocaleError(requested);
      }
      this.log.debug?.(`locale '${requested}' is not registered, using fallback '${this.fallback}'`);
      code = this.fallback;
    }

    const textOptions: LanguageTextOptions = {
      params: options.params,
      listFormatter: options.listFormatter,
      useTranslations: options.useTranslations ?? this.defaults.useTranslations,
      raiseOnEmpty: true,
    };

    const language = this.requireLanguage(code);
    const text = tryGetText(language, key, textOptions);
    if (text !== undefined) {
      return text;
    }

    if (shouldFallback && code !== this.fallback) {
      const fallbackText = tryGetText(this.requireLanguage(this.fallback), key, textOptions);
      if (fallbackText !== undefined) {
        this.log.debug?.(`'${key}' served from fallback '${this.fallback}' for locale '${code}'`);
        return fallbackText;
      }
    }

    if (options.defaultValue !== undefined) {
      return language.format(options.defaultValue, textOptions);
    }

    if (raiseOnEmpty) {
      throw new InvalidTranslationKeyError(key, code, this.fallback);
    }

    this.log.warn(
      `Translation key '${key}' not found in locale '${code}' nor in fallback '${this.fallback}'`,
    );
    return "";
  }

  /**
   * Check if a translation key exists
   */
  hasTranslation(key: string, locale?: LocaleCode): boolean {
    return this.getLanguage(locale ?? this.defaultLocale())?.has(key) ?? false;
  }

  /**
   * Get all translation keys for a locale
   */
  getTranslationKeys(locale?: LocaleCode): string[] {
    return this.getLanguage(locale ?? this.defaultLocale())?.keys() ?? [];
  }

  /**
   * Get missing keys (keys in the fallback locale but not in the target locale)
   */
  getMissingKeys(locale: LocaleCode): string[] {
    const target = this.requireLanguage(this.resolveKnown(locale));
    if (target.code === this.fallback) return [];

    const baseline = this.requireLanguage(this.fallback);
    return baseline.keys().filter((key) => baseline.has(key) && !target.has(key));
  }

  /**
   * Get extra keys (keys in the target locale that the fallback locale lacks)
   */
  getExtraKeys(locale: LocaleCode): string[] {
    const target = this.requireLanguage(this.resolveKnown(locale));
    if (target.code === this.fallback) return [];

    const baseline = this.requireLanguage(this.fallback);
    return target.keys().filter((key) => target.has(key) && !baseline.has(key));
  }

  private resolveKnown(locale: LocaleCode): LocaleCode {
    const code = this.resolveLocale(locale);
    if (code === undefined) {
      throw new InvalidLocaleError(locale);
    }
    return code;
  }

  private requireLanguage(code: LocaleCode): Language {
    const language = this.languageMap.get(code);
    if (!language) {
      throw new InvalidLocaleError(code);
    }
    return language;
  }
}

function fallbackByIndex(languages: readonly Language[], index: number): LocaleCode | undefined {
  return Number.isInteger(index) ? languages.at(index)?.code : undefined;
}

// Lookup failures from a language table mean "not here"; anything else is a bug
function tryGetText(language: Language, key: string, options: LanguageTextOptions): string | undefined {
  try {
    return language.getText(key, options);
  } catch (err) {
    if (isI18nError(err)) {
      return undefined;
    }
    throw err;
  }
}
