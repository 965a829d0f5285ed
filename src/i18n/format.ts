import type { ListFormatter, TranslationParamValue } from "./types.js";

/** Resolves a placeholder name to its replacement, or undefined to keep it */
export type TemplateLookup = (name: string) => string | undefined;

// "{{" and "}}" are literal braces; "{name}" is a placeholder
const PLACEHOLDER_PATTERN = /\{\{|\}\}|\{([^{}]+)\}/g;

/**
 * Substitute `{name}` placeholders in a single pass.
 *
 * Unknown placeholders are kept verbatim and unbalanced braces are left as
 * they are. Replacement text is never scanned again.
 *
 * Example: formatTemplate("Hi {user}, {{literal}}", { user: "Ada" }) => "Hi Ada, {literal}"
 */
export function formatTemplate(
  template: string,
  values: Readonly<Record<string, string>> | TemplateLookup,
): string {
  const lookup: TemplateLookup =
    typeof values === "function"
      ? values
      : (name) => (Object.hasOwn(values, name) ? values[name] : undefined);

  return template.replace(PLACEHOLDER_PATTERN, (match: string, name: string | undefined) => {
    if (name === undefined) {
      return match === "{{" ? "{" : "}";
    }
    return lookup(name) ?? match;
  });
}

/**
 * Join list items so the connector sits before the last item:
 * ["a"] => "a", ["a", "b"] => "a and b", ["a", "b", "c"] => "a, b and c"
 */
export function joinList(items: readonly string[], connector: string, separator = ", "): string {
  if (items.length === 0) return "";
  if (items.length === 1) return items[0];
  if (items.length === 2) return `${items[0]}${connector}${items[1]}`;

  const head = items.slice(0, -1).join(separator);
  return `${head}${connector}${items[items.length - 1]}`;
}

/**
 * Render a substitution value as text. Arrays go through the list formatter,
 * or a plain comma-separated join when none is given.
 */
export function stringifyParam(value: TranslationParamValue, listFormatter?: ListFormatter): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (isParamList(value)) {
    const items = value.map((item) => stringifyParam(item, listFormatter));
    return listFormatter ? listFormatter(items) : items.join(", ");
  }
  return String(value);
}

function isParamList(value: TranslationParamValue): value is readonly TranslationParamValue[] {
  return Array.isArray(value);
}
