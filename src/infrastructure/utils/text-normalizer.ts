/**
 * Text normalization helpers
 */

/**
 * Strips diacritics
 */
function removeAccents(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');
}

/**
 * Lowercases, strips accents, trims and collapses inner whitespace
 */
export function normalizeText(text: string): string {
  return removeAccents(text.toLowerCase().trim()).replace(/\s+/g, ' ');
}

/**
 * Splits normalized text into word tokens (letters, digits, dot, dash)
 */
export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/[^a-z0-9.\-]+/)
    .map((token) => token.replace(/^[.\-]+|[.\-]+$/g, ''))
    .filter((token) => token.length > 0);
}
