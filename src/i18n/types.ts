/**
 * i18n type definitions
 *
 * Locale tables are built from nested translation documents and stored flat,
 * keyed by delimiter-joined paths.
 */

/** Locale identifier, e.g. "en-US" or "pt" */
export type LocaleCode = string;

/** Default delimiter used when flattening nested documents */
export const DEFAULT_DELIMITER = ".";

/** A single stored translation value */
export type TranslationLeaf = string | number | boolean | null;

/** Any value that can appear inside a translation document */
export type TranslationNode = TranslationLeaf | TranslationDocument | TranslationNode[];

/**
 * Translation document structure (nested keys)
 * Example: { greeting: { hello: "Hello, {name}!" }, items: ["one", "two"] }
 */
export type TranslationDocument = {
  [key: string]: TranslationNode;
};

/**
 * Flattened translation dictionary (delimiter-joined keys)
 * Example: { "greeting.hello": "Hello, {name}!", "items.0": "one" }
 */
export type FlatTranslationDict = Record<string, TranslationLeaf>;

/** Value accepted for `{name}` substitution */
export type TranslationParamValue =
  | string
  | number
  | boolean
  | bigint
  | null
  | undefined
  | readonly TranslationParamValue[];

/**
 * Substitution parameters
 * Example: getText("greeting.hello", "en", { params: { name: "Ada" } }) => "Hello, Ada!"
 */
export type TranslationParams = Record<string, TranslationParamValue>;

/** Turns a list parameter into a single string */
export type ListFormatter = (items: readonly string[]) => string;

/** Options understood by a single language table */
export type LanguageTextOptions = {
  /** Values substituted into `{name}` placeholders */
  params?: TranslationParams;
  /** Formatter applied to array params; defaults to a comma-separated join */
  listFormatter?: ListFormatter;
  /** Let placeholders fall through to other entries of the same table */
  useTranslations?: boolean;
  /** Throw when the key is missing or empty instead of returning "" */
  raiseOnEmpty?: boolean;
};

/** Options understood by the resolver */
export type GetTextOptions = LanguageTextOptions & {
  /** Retry against the fallback locale when the locale or key is missing */
  shouldFallback?: boolean;
  /** Template used when neither the locale nor the fallback has the key */
  defaultValue?: string;
};

/**
 * Translation function signature
 */
export type TranslationFunction = (
  key: string,
  locale?: LocaleCode,
  options?: GetTextOptions,
) => string;
