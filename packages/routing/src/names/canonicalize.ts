/**
 * Lowercase and drop every character outside a-z and space, so that
 * "St. Mary's Café" and "st marys caf" share one lookup key.
 */
export function canonicalize(text: string): string {
  let out = "";
  for (const ch of text.toLowerCase()) {
    if ((ch >= "a" && ch <= "z") || ch === " ") out += ch;
  }
  return out;
}

/** True when a canonical key has at least one letter */
export function hasLetters(canonical: string): boolean {
  return canonical.trim().length > 0;
}
