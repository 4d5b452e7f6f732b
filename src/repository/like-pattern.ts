/**
 * Turns arbitrary text into a LIKE pattern that matches it as a plain
 * substring. Backslash is PostgreSQL's default LIKE escape character.
 */
export function containsPattern(text: string): string {
  return `%${text.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}
