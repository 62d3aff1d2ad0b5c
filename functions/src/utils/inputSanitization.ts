const SCRIPT_OR_STYLE_TAG_REGEX = /<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi;
const HTML_TAG_REGEX = /<[^>]+>/g;
const CONTROL_CHARACTER_REGEX = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export const MAX_TERM_LENGTH = 200;

/**
 * Free text (override reasons, notes): strips markup and control characters,
 * normalizes line endings and caps the length.
 */
export function sanitizePlainText(value: unknown, maxLength = 10000): string {
  if (typeof value !== 'string') {
    return '';
  }

  let clean = value
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .replace(SCRIPT_OR_STYLE_TAG_REGEX, ' ')
    .replace(HTML_TAG_REGEX, ' ')
    .replace(CONTROL_CHARACTER_REGEX, '');

  clean = clean
    .split('\n')
    .map((line) => line.replace(/[ \t]{2,}/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  if (clean.length > maxLength) {
    clean = clean.slice(0, maxLength).trimEnd();
  }

  return clean;
}

/**
 * Single-line terms (drug names, condition ids, allergens). Newlines collapse
 * to spaces.
 */
export function sanitizeTerm(value: unknown, maxLength = MAX_TERM_LENGTH): string {
  return sanitizePlainText(value, maxLength).replace(/\s+/g, ' ');
}

/** Stands in for an entry that had content but nothing readable left after sanitizing. */
export const UNREADABLE_TERM = '(unreadable entry)';

/**
 * Sanitize each entry, keeping order and duplicates. Blank entries are dropped;
 * an entry made only of markup or control characters becomes `UNREADABLE_TERM`
 * so it is still reported as unrecognized.
 */
export function sanitizeTermList(values: readonly unknown[], maxLength = MAX_TERM_LENGTH): string[] {
  return values.flatMap((value) => {
    const term = sanitizeTerm(value, maxLength);
    if (term.length > 0) {
      return [term];
    }
    return typeof value === 'string' && value.trim().length > 0 ? [UNREADABLE_TERM] : [];
  });
}
