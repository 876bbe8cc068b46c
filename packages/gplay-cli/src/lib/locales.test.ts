import { describe, it, expect } from "vitest";
import { checkLocale, supportedLocales, validateLocale, validateVideoUrl } from "./locales.js";

describe("locales", () => {
  it("loads the supported list", () => {
    expect(supportedLocales()).toContain("en-US");
    expect(supportedLocales()).toContain("es-419");
  });

  it("suggests fixes for mistyped codes", () => {
    expect(checkLocale("de-DE")).toBeUndefined();
    expect(checkLocale("en_US")).toBe(
      'invalid locale "en_US": did you mean "en-US"? Use hyphens, not underscores'
    );
    expect(checkLocale("pt-br")).toBe(
      'invalid locale "pt-br": did you mean "pt-BR"? Check capitalization'
    );
    expect(checkLocale("xx-XX")).toBe(
      'invalid locale "xx-XX": not a supported Google Play locale'
    );
    expect(checkLocale(" ")).toBe("locale code is empty");
  });

  it("throws flag errors", () => {
    expect(validateLocale(" fr-FR ")).toBe("fr-FR");
    expect(() => validateLocale("en_GB")).toThrowError('--locale: invalid locale "en_GB"');
  });

  it("accepts YouTube links only", () => {
    expect(() => validateVideoUrl("")).not.toThrow();
    expect(() => validateVideoUrl("https://youtu.be/abc_123")).not.toThrow();
    expect(() => validateVideoUrl("https://vimeo.com/1")).toThrowError(
      "invalid YouTube URL: https://vimeo.com/1"
    );
  });
});
