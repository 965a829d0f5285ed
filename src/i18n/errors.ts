import type { LocaleCode } from "./types.js";

export type I18nErrorCode =
  | "I18N_INVALID_LOCALE"
  | "I18N_INVALID_KEY"
  | "I18N_INVALID_FALLBACK"
  | "I18N_NO_DEFAULT_INSTANCE"
  | "I18N_EMPTY_KEY"
  | "I18N_INVALID_DOCUMENT"
  | "I18N_INVALID_DELIMITER";

/**
 * Base error for every lookup failure raised by this package.
 *
 * The resolver treats any `I18nError` coming out of a language table as
 * "not found here"; other errors propagate untouched.
 */
export class I18nError extends Error {
  readonly code: I18nErrorCode;

  constructor(code: I18nErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }

  toJSON(): { name: string; code: I18nErrorCode; message: string } {
    return { name: this.name, code: this.code, message: this.message };
  }
}

export class InvalidLocaleError extends I18nError {
  readonly locale: LocaleCode;

  constructor(locale: LocaleCode) {
    super("I18N_INVALID_LOCALE", `Given locale '${locale}' does not exist!`);
    this.locale = locale;
  }
}

export class InvalidTranslationKeyError extends I18nError {
  readonly key: string;
  readonly locale: LocaleCode;
  readonly fallback: LocaleCode;

  constructor(key: string, locale: LocaleCode, fallback: LocaleCode) {
    super(
      "I18N_INVALID_KEY",
      `Translation '${key}' not found for locale '${locale}', nor fallback '${fallback}'`,
    );
    this.key = key;
    this.locale = locale;
    this.fallback = fallback;
  }
}

export class InvalidFallbackError extends I18nError {
  readonly fallback: LocaleCode | number;

  constructor(fallback: LocaleCode | number) {
    super(
      "I18N_INVALID_FALLBACK",
      `Invalid fallback: '${fallback}'. Fallback must be a valid locale code.`,
    );
    this.fallback = fallback;
  }
}

export class NoDefaultI18nInstanceError extends I18nError {
  constructor() {
    super("I18N_NO_DEFAULT_INSTANCE", "No default i18n instance has been initialized!");
  }
}

export class TranslationKeyEmptyError extends I18nError {
  readonly key: string;
  readonly locale: LocaleCode;

  constructor(key: string, locale: LocaleCode) {
    super("I18N_EMPTY_KEY", `Translation for key '${key}' in language '${locale}' is empty.`);
    this.key = key;
    this.locale = locale;
  }
}

export class InvalidTranslationDocumentError extends I18nError {
  readonly locale: LocaleCode;
  readonly issues: readonly string[];

  constructor(locale: LocaleCode, issues: readonly string[]) {
    super(
      "I18N_INVALID_DOCUMENT",
      `Translation document for '${locale}' is invalid: ${issues.join("; ")}`,
    );
    this.locale = locale;
    this.issues = issues;
  }
}

export class InvalidDelimiterError extends I18nError {
  readonly delimiter: string;

  constructor(delimiter: string) {
    super(
      "I18N_INVALID_DELIMITER",
      `Invalid delimiter: '${delimiter}'. Delimiter must be a non-empty string.`,
    );
    this.delimiter = delimiter;
  }
}

export function isI18nError(value: unknown): value is I18nError {
  return value instanceof I18nError;
}
