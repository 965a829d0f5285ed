import type { GetTextOptions, LocaleCode, TranslationFunction } from "./types.js";
import { DocumentOptionsSchema, type DocumentOptionsInput } from "../config/config.js";
import { NoDefaultI18nInstanceError } from "./errors.js";
import { I18n, type I18nOptions } from "./i18n.js";
import { Language } from "./language.js";
import { detectSystemLocale } from "./locale.js";

export type LanguageEntry = {
  name: string;
  code: LocaleCode;
  /** Nested translation document, typically parsed from a locale file */
  document: unknown;
};

export type I18nExtensionOptions = I18nOptions & {
  /** Register as the default instance even when one already exists (default true) */
  default?: boolean;
};

export type FromDocumentsOptions = I18nExtensionOptions &
  DocumentOptionsInput & {
    /** Fallback locale; defaults to the system locale, then the first entry */
    fallback?: LocaleCode | number;
  };

/**
 * Process-wide i18n instance with a "current locale".
 *
 * Usage:
 *   new I18nExtension([en, pt], "en");
 *
 *   // Per incoming message
 *   I18nExtension.defaultInstance?.setCurrentLocale(message.locale);
 *
 *   // Anywhere downstream
 *   _("greeting.hello", undefined, { params: { name: "Ana" } });
 */
export class I18nExtension extends I18n {
  static defaultInstance: I18nExtension | null = null;

  private currentLocale: LocaleCode | undefined;

  constructor(
    languages: Iterable<Language>,
    fallback: LocaleCode | number,
    options: I18nExtensionOptions = {},
  ) {
    super(languages, fallback, withoutDefaultFlag(options));

    if ((options.default ?? true) || I18nExtension.defaultInstance === null) {
      I18nExtension.defaultInstance = this;
    }
  }

  /**
   * Build an instance from `{ name, code, document }` entries, validating
   * every document before it is flattened.
   */
  static fromDocuments(
    entries: readonly LanguageEntry[],
    options: FromDocumentsOptions = {},
  ): I18nExtension {
    const { delimiter, fallback, ...rest } = options;
    const settings = DocumentOptionsSchema.parse({ delimiter });

    const languages = entries.map((entry) =>
      Language.fromDocument(entry.name, entry.code, entry.document, settings.delimiter),
    );

    const resolvedFallback =
      fallback ?? detectSystemLocale(languages.map((language) => language.code)) ?? 0;
    return new I18nExtension(languages, resolvedFallback, rest);
  }

  setCurrentLocale(locale: LocaleCode): void {
    this.currentLocale = locale;
  }

  /**
   * Get the current locale, or the fallback when none was set
   */
  getCurrentLocale(): LocaleCode {
    return this.currentLocale ?? this.fallback;
  }

  protected override defaultLocale(): LocaleCode {
    return this.getCurrentLocale();
  }

  /**
   * Translate through the default instance, in the current locale unless one
   * is given. Missing keys resolve to "" (with a warning) unless
   * `raiseOnEmpty` is set.
   *
   * @throws NoDefaultI18nInstanceError when no instance is registered
   */
  static contextualGetText(key: string, locale?: LocaleCode, options: GetTextOptions = {}): string {
    const i18n = I18nExtension.defaultInstance;
    if (!i18n) {
      throw new NoDefaultI18nInstanceError();
    }

    return i18n.getText(key, locale ?? i18n.getCurrentLocale(), {
      ...options,
      raiseOnEmpty: options.raiseOnEmpty ?? false,
    });
  }

  /**
   * Drop the default instance and forget its current locale
   *
   * @throws NoDefaultI18nInstanceError when no instance is registered
   */
  static unload(): void {
    const i18n = I18nExtension.defaultInstance;
    if (!i18n) {
      throw new NoDefaultI18nInstanceError();
    }

    I18nExtension.defaultInstance = null;
    i18n.currentLocale = undefined;
  }
}

function withoutDefaultFlag(options: I18nExtensionOptions): I18nOptions {
  const { default: _default, ...rest } = options;
  return rest;
}

export const _: TranslationFunction = I18nExtension.contextualGetText;
export const unload = I18nExtension.unload;
