/**
 * Person Name Keys
 *
 * Comparison forms of patient names. Sources disagree on case, spacing
 * and punctuation ("SMITH-JONES", "Smith Jones", "smith  jones").
 */

/**
 * Case- and whitespace-insensitive form of one name part.
 *
 * @example
 * nameKey("  Mary   Ann ") // "mary ann"
 */
export function nameKey(value: string | undefined): string {
  return (value ?? '').toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Letters only, for prefix comparison of surnames. Hyphens, apostrophes and
 * spaces are dropped so "O'Neil", "ONeil" and "O Neil" agree; accented
 * letters are kept.
 *
 * @example
 * surnameLetters("Smith-Jones") // "smithjones"
 * surnameLetters("Müller")      // "müller"
 */
export function surnameLetters(value: string | undefined): string {
  return (value ?? '').toLowerCase().replace(/[^\p{L}]/gu, '');
}

/**
 * Key for the exact (first, last) rule, or null when either part is blank.
 */
export function fullNameKey(firstName: string, lastName: string): string | null {
  const first = nameKey(firstName);
  const last = nameKey(lastName);
  if (!first || !last) {
    return null;
  }
  return `${first}|${last}`;
}
