import type {
  FlatTranslationDict,
  LanguageTextOptions,
  ListFormatter,
  LocaleCode,
  TranslationDocument,
  TranslationLeaf,
} from "./types.js";
import { InvalidTranslationDocumentError, TranslationKeyEmptyError } from "./errors.js";
import { flattenDict, stringifyLeaf } from "./flatten.js";
import { formatTemplate, joinList, stringifyParam } from "./format.js";
import { TranslationDocumentSchema, formatSchemaIssues } from "./schema.js";
import { DEFAULT_DELIMITER } from "./types.js";

export type LanguageInit = {
  /** Display name, e.g. "English" */
  name: string;
  /** Locale code the language is registered under */
  code: LocaleCode;
  /** Flat table or nested document; nested documents are flattened */
  translations?: FlatTranslationDict | TranslationDocument;
  delimiter?: string;
};

/**
 * One locale's flat key -> translation table.
 *
 * Example:
 *   const en = new Language({
 *     name: "English",
 *     code: "en",
 *     translations: { you_lost: "You lost the {game}", game: "game" },
 *   });
 *   en.getText("you_lost"); // => "You lost the game"
 */
export class Language {
  readonly name: string;
  readonly code: LocaleCode;
  readonly translations: Readonly<FlatTranslationDict>;

  constructor(init: LanguageInit) {
    this.name = init.name;
    this.code = init.code;
    this.translations = flattenDict(init.translations ?? {}, init.delimiter ?? DEFAULT_DELIMITER);
  }

  /**
   * Build a language from an untrusted document (e.g. parsed JSON),
   * validating its shape first.
   */
  static fromDocument(
    name: string,
    code: LocaleCode,
    document: unknown,
    delimiter: string = DEFAULT_DELIMITER,
  ): Language {
    const parsed = TranslationDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new InvalidTranslationDocumentError(code, formatSchemaIssues(parsed.error));
    }
    return new Language({ name, code, translations: parsed.data, delimiter });
  }

  /**
   * The stored value for a key, or undefined when the key is absent
   */
  lookup(key: string): TranslationLeaf | undefined {
    return Object.hasOwn(this.translations, key) ? this.translations[key] : undefined;
  }

  /**
   * Whether the key holds a usable (non-empty) translation
   */
  has(key: string): boolean {
    const value = this.lookup(key);
    return value !== undefined && value !== "";
  }

  keys(): string[] {
    return Object.keys(this.translations);
  }

  /**
   * Get the formatted translation for a key.
   *
   * Placeholders are filled from `params` first and, when `useTranslations`
   * is on (the default), from other entries of this table.
   *
   * @throws TranslationKeyEmptyError when the key is missing or empty and
   *   `raiseOnEmpty` is on (the default)
   */
  getText(key: string, options: LanguageTextOptions = {}): string {
    const value = this.lookup(key);

    if (value === undefined || value === "") {
      if (options.raiseOnEmpty ?? true) {
        throw new TranslationKeyEmptyError(key, this.code);
      }
      return "";
    }

    if (typeof value !== "string") {
      return stringifyLeaf(value);
    }

    return this.format(value, options);
  }

  /**
   * Fill a template against this table without looking it up first
   */
  format(template: string, options: LanguageTextOptions = {}): string {
    const { params, listFormatter } = options;
    const useTranslations = options.useTranslations ?? true;

    return formatTemplate(template, (name) => {
      if (params && Object.hasOwn(params, name)) {
        return stringifyParam(params[name], listFormatter);
      }
      if (useTranslations) {
        const value = this.lookup(name);
        return value === undefined ? undefined : stringifyLeaf(value);
      }
      return undefined;
    });
  }

  /**
   * Join items with a connector placed before the last one
   */
  joinList(items: readonly string[], connector: string): string {
    return joinList(items, connector);
  }

  /** List formatter using the `and_` translation: "a, b and c" */
  readonly and: ListFormatter = (items) => this.joinList(items, ` ${this.connector("and_")} `);

  /** List formatter using the `or_` translation: "a, b or c" */
  readonly or: ListFormatter = (items) => this.joinList(items, ` ${this.connector("or_")} `);

  private connector(key: string): string {
    const value = this.lookup(key);
    if (value === undefined || value === "") {
      throw new TranslationKeyEmptyError(key, this.code);
    }
    return stringifyLeaf(value);
  }
}
