/*
 * Structural scan of generated pattern sources, so the compiler can gate a
 * pattern against the target dialect.
 */

/**
 * True when `source` contains `(?=` or `(?!` outside a character class and
 * not behind an escape.
 */
export function usesLookahead(source: string): boolean {
  let inClass = false;
  let escaping = false;

  for (let i = 0; i < source.length; i += 1) {
    const ch = source.charAt(i);

    if (escaping) {
      escaping = false;
      continue;
    }
    if (ch === '\\') {
      escaping = true;
      continue;
    }
    if (inClass) {
      if (ch === ']') inClass = false;
      continue;
    }

    if (ch === '[') {
      inClass = true;
      // A leading `]` or `^]` is a literal member, not the class end.
      if (source.charAt(i + 1) === '^') i += 1;
      if (source.charAt(i + 1) === ']') i += 1;
    } else if (ch === '(') {
      const head = source.slice(i + 1, i + 3);
      if (head === '?=' || head === '?!') return true;
    }
  }

  return false;
}
