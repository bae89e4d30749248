import type { Logger } from './logger.js';

const SEPARATORS = /[\s\-_.]/g;
const TYPE_PREFIX = /^mc/i;
const MAX_DIGITS = 10;

/**
 * Clean a single raw token into a bare numeric carrier identifier.
 * Returns null when the token is empty or does not look like one.
 */
export function cleanIdentifier(token: string, logger?: Logger): string | null {
  const trimmed = token.trim();
  if (!trimmed) return null;

  const cleaned = trimmed.replace(SEPARATORS, '').replace(TYPE_PREFIX, '');

  if (cleaned.length > 0 && cleaned.length <= MAX_DIGITS && /^\d+$/.test(cleaned)) {
    return cleaned;
  }

  logger?.warn({ token: trimmed }, 'Invalid MC number format');
  return null;
}

/**
 * Pull identifiers out of free-form text (comma- or newline-separated).
 * Duplicates collapse to their first occurrence; order is preserved.
 */
export function normalizeIdentifiers(text: string, logger?: Logger): string[] {
  const seen = new Set<string>();
  const identifiers: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (!line.trim()) continue;

    for (const part of line.split(',')) {
      const id = cleanIdentifier(part, logger);
      if (id && !seen.has(id)) {
        seen.add(id);
        identifiers.push(id);
      }
    }
  }

  logger?.info({ count: identifiers.length }, 'Extracted unique MC numbers from input');
  return identifiers;
}
