/**
 * Locale code matching and system locale detection
 */

import type { LocaleCode } from "./types.js";
import { resolveEnvConfig } from "../config/config.js";

/**
 * Normalize a locale code for comparison
 *
 * Handles formats like "pt_BR.UTF-8", "en_US", "PT-br", "en"
 */
export function normalizeLocaleCode(code: string): string {
  // Drop encoding and modifier suffixes ("pt_BR.UTF-8", "sr_RS@latin")
  const base = code.trim().split(/[.@]/)[0];
  return base.toLowerCase().replace(/_/g, "-");
}

function primarySubtag(code: string): string {
  return normalizeLocaleCode(code).split("-")[0];
}

/**
 * Find the registered locale code that best serves a requested one
 *
 * Priority: exact code > normalized code > bare language > first regional
 * code of the same language
 */
export function matchLocale(
  requested: string | undefined,
  available: Iterable<LocaleCode>,
): LocaleCode | undefined {
  if (!requested?.trim()) return undefined;

  const codes = [...available];
  if (codes.includes(requested)) {
    return requested;
  }

  const normalized = normalizeLocaleCode(requested);
  const direct = codes.find((code) => normalizeLocaleCode(code) === normalized);
  if (direct) {
    return direct;
  }

  // "pt-BR" -> "pt", and "pt" -> the first registered "pt-*"
  const prefix = primarySubtag(requested);
  return (
    codes.find((code) => normalizeLocaleCode(code) === prefix) ??
    codes.find((code) => primarySubtag(code) === prefix)
  );
}

/**
 * Detect a locale from environment variables
 *
 * Checks: CHATBOT_I18N_LOCALE, LANG, LC_ALL, LC_MESSAGES
 * Returns the first candidate matching a registered locale, if any
 */
export function detectSystemLocale(
  available: Iterable<LocaleCode>,
  env: NodeJS.ProcessEnv = process.env,
): LocaleCode | undefined {
  const codes = [...available];
  const candidates = [resolveEnvConfig(env).locale, env.LANG, env.LC_ALL, env.LC_MESSAGES];

  for (const candidate of candidates) {
    if (!candidate) continue;

    // "C", "C.UTF-8" and "POSIX" carry no language
    const normalized = normalizeLocaleCode(candidate);
    if (normalized === "c" || normalized === "posix") continue;

    const match = matchLocale(candidate, codes);
    if (match) {
      return match;
    }
  }

  return undefined;
}
