/**
 * Lowercase, strip diacritics and collapse punctuation to single spaces, so
 * "Albariño D.O. Rías Baixas" becomes "albarino d o rias baixas".
 */
export const normalizeForMatch = (value: string): string =>
  value
    .toLowerCase()
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, " ")
    .trim();

/** Whole-word (or whole-phrase) containment on normalized text. */
export const containsPhrase = (normalizedHaystack: string, normalizedNeedle: string): boolean => {
  if (!normalizedNeedle) return false;
  return ` ${normalizedHaystack} `.includes(` ${normalizedNeedle} `);
};
