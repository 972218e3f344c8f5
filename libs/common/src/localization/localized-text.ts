/** Language code to translated string, e.g. `{ en: 'Shoes', fr: 'Chaussures' }`. */
export type LocalizedText = Record<string, string>;

const LANGUAGE_CODE = /^[a-z]{2}(-[A-Z]{2})?$/;

export function isLocalizedText(value: unknown): value is LocalizedText {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const entries = Object.entries(value);
  if (entries.length === 0) {
    return false;
  }
  return entries.every(
    ([language, text]) =>
      LANGUAGE_CODE.test(language) &&
      typeof text === 'string' &&
      text.trim().length > 0,
  );
}

/**
 * Picks the translation for `language`, then `fallback`, then whatever
 * translation exists first. Empty or missing text yields `''`.
 */
export function localize(
  text: LocalizedText | null | undefined,
  language: string,
  fallback = 'en',
): string {
  if (!text) {
    return '';
  }
  return text[language] ?? text[fallback] ?? Object.values(text)[0] ?? '';
}
