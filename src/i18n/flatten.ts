import type {
  FlatTranslationDict,
  TranslationDocument,
  TranslationLeaf,
  TranslationNode,
} from "./types.js";
import { InvalidDelimiterError } from "./errors.js";
import { DEFAULT_DELIMITER } from "./types.js";

function isBranch(value: TranslationNode): value is TranslationDocument | TranslationNode[] {
  return typeof value === "object" && value !== null;
}

/**
 * Flatten a nested translation document into delimiter-joined keys.
 *
 * Arrays contribute their indices as path segments, so
 * `{ steps: ["a", { title: "b" }] }` becomes `{ "steps.0": "a", "steps.1.title": "b" }`.
 * Empty objects and arrays produce no keys. When two paths collide, the one
 * visited last wins.
 */
export function flattenDict(
  data: TranslationDocument | TranslationNode[],
  delimiter: string = DEFAULT_DELIMITER,
): FlatTranslationDict {
  if (typeof delimiter !== "string" || delimiter.length === 0) {
    throw new InvalidDelimiterError(String(delimiter));
  }

  const result: FlatTranslationDict = {};

  const walk = (node: TranslationDocument | TranslationNode[], prefix: string): void => {
    const entries: Array<[string, TranslationNode]> = Array.isArray(node)
      ? node.map((value, index) => [String(index), value])
      : Object.entries(node);

    for (const [key, value] of entries) {
      const fullKey = prefix ? `${prefix}${delimiter}${key}` : key;

      if (isBranch(value)) {
        walk(value, fullKey);
      } else {
        // Plain assignment would hit the prototype setter for "__proto__"
        Object.defineProperty(result, fullKey, {
          value,
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
    }
  };

  walk(data, "");
  return result;
}

/**
 * Render a stored leaf as text. `null` renders as an empty string.
 */
export function stringifyLeaf(value: TranslationLeaf): string {
  return value === null ? "" : String(value);
}
