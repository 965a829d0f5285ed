import { describe, expect, it } from "vitest";
import { detectSystemLocale, matchLocale, normalizeLocaleCode } from "./locale.js";

describe("normalizeLocaleCode", () => {
  it("normalizes various locale formats", () => {
    expect(normalizeLocaleCode("pt")).toBe("pt");
    expect(normalizeLocaleCode("PT")).toBe("pt");
    expect(normalizeLocaleCode("pt_BR")).toBe("pt-br");
    expect(normalizeLocaleCode("  EN-us ")).toBe("en-us");
    expect(normalizeLocaleCode("pt_BR.UTF-8")).toBe("pt-br");
    expect(normalizeLocaleCode("sr_RS@latin")).toBe("sr-rs");
  });
});

describe("matchLocale", () => {
  const available = ["en", "pt-BR"];

  it("prefers exact codes", () => {
    expect(matchLocale("en", available)).toBe("en");
    expect(matchLocale("pt-BR", ["pt", "pt-BR"])).toBe("pt-BR");
  });

  it("matches normalized codes", () => {
    expect(matchLocale("pt_BR", available)).toBe("pt-BR");
    expect(matchLocale("pt-br", ["pt", "pt-BR"])).toBe("pt-BR");
  });

  it("matches by language prefix", () => {
    expect(matchLocale("pt", available)).toBe("pt-BR");
    expect(matchLocale("pt-PT", available)).toBe("pt-BR");
    expect(matchLocale("en_GB.UTF-8", available)).toBe("en");
  });

  it("prefers the bare language over another region", () => {
    expect(matchLocale("pt-BR", ["pt-PT", "pt"])).toBe("pt");
    expect(matchLocale("pt_BR.UTF-8", ["en", "pt-PT", "PT"])).toBe("PT");
    expect(matchLocale("pt-BR", ["pt-PT", "pt-AO"])).toBe("pt-PT");
  });

  it("returns undefined for unknown or empty locales", () => {
    expect(matchLocale("fr", available)).toBeUndefined();
    expect(matchLocale("", available)).toBeUndefined();
    expect(matchLocale("  ", available)).toBeUndefined();
    expect(matchLocale(undefined, available)).toBeUndefined();
  });
});

describe("detectSystemLocale", () => {
  const available = ["en", "pt-BR"];

  it("prioritizes CHATBOT_I18N_LOCALE", () => {
    expect(detectSystemLocale(available, { CHATBOT_I18N_LOCALE: "pt", LANG: "en_US.UTF-8" })).toBe(
      "pt-BR",
    );
  });

  it("falls back to LANG", () => {
    expect(detectSystemLocale(available, { LANG: "pt_BR.UTF-8" })).toBe("pt-BR");
  });

  it("skips locales without a language", () => {
    expect(detectSystemLocale(available, { LANG: "C.UTF-8", LC_ALL: "en_US" })).toBe("en");
    expect(detectSystemLocale(available, { LANG: "POSIX" })).toBeUndefined();
  });

  it("returns undefined when nothing matches", () => {
    expect(detectSystemLocale(available, {})).toBeUndefined();
    expect(detectSystemLocale(available, { LANG: "fr_FR.UTF-8" })).toBeUndefined();
  });
});
