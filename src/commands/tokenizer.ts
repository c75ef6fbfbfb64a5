// Unicode White_Space: `\s` plus U+0085, minus U+FEFF
const SPACE = /[\t\n\v\f\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]/u;

/**
 * Splits message text into whitespace separated fields.
 * A double-quoted span is a single field with the quotes removed;
 * an unterminated quote runs to the end of the input.
 */
export function tokenize(input: string): string[] {
  const fields: string[] = [];
  let current: string | null = null;
  let quoted = false;

  for (const char of input) {
    if (char === '"') {
      if (current === null) {
        current = '';
        quoted = true;
      } else {
        fields.push(current);
        current = null;
        quoted = false;
      }
    } else if (!quoted && SPACE.test(char)) {
      if (current !== null) {
        fields.push(current);
        current = null;
      }
    } else {
      current = (current ?? '') + char;
    }
  }

  if (current !== null) {
    fields.push(current);
  }

  return fields;
}
