/**
 * Chat bot internationalization (i18n) module
 *
 * Usage:
 *   import { I18nExtension, Language, _ } from "chatbot-i18n";
 *
 *   const en = new Language({
 *     name: "English",
 *     code: "en",
 *     translations: { greeting: { hello: "Hello, {name}!" }, and_: "and" },
 *   });
 *   const pt = new Language({
 *     name: "Português",
 *     code: "pt-BR",
 *     translations: { greeting: { hello: "Olá, {name}!" }, and_: "e" },
 *   });
 *
 *   new I18nExtension([en, pt], "en");
 *
 *   // Per incoming message
 *   I18nExtension.defaultInstance?.setCurrentLocale("pt-BR");
 *
 *   _("greeting.hello", undefined, { params: { name: "Ana" } });
 *   // => "Olá, Ana!"
 */

export { I18n, type I18nOptions } from "./i18n.js";
export {
  I18nExtension,
  _,
  unload,
  type FromDocumentsOptions,
  type I18nExtensionOptions,
  type LanguageEntry,
} from "./extension.js";
export { Language, type LanguageInit } from "./language.js";
export { flattenDict } from "./flatten.js";
export { formatTemplate, joinList, stringifyParam, type TemplateLookup } from "./format.js";
export { detectSystemLocale, matchLocale, normalizeLocaleCode } from "./locale.js";
export { TranslationDocumentSchema } from "./schema.js";
export {
  I18nError,
  InvalidDelimiterError,
  InvalidFallbackError,
  InvalidLocaleError,
  InvalidTranslationDocumentError,
  InvalidTranslationKeyError,
  NoDefaultI18nInstanceError,
  TranslationKeyEmptyError,
  isI18nError,
  type I18nErrorCode,
} from "./errors.js";

// Re-export types and constants
export { DEFAULT_DELIMITER } from "./types.js";
export type {
  FlatTranslationDict,
  GetTextOptions,
  LanguageTextOptions,
  ListFormatter,
  LocaleCode,
  TranslationDocument,
  TranslationFunction,
  TranslationLeaf,
  TranslationNode,
  TranslationParamValue,
  TranslationParams,
} from "./types.js";
