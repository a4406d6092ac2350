const SPACE_PATTERN = /\s+/g;

export function normalizeWhitespace(value: string): string {
  return value.replace(SPACE_PATTERN, ' ').trim();
}

/** Collapses whitespace; an all-blank query becomes null. */
export function normalizeQuery(value: string): string | null {
  const trimmed = normalizeWhitespace(value);
  return trimmed ? trimmed : null;
}
