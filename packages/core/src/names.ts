/**
 * Identifiers are case-insensitive. Names are canonicalized once, where they are
 * read off an AST node; tables and frames only ever see canonical keys.
 */
export function canonicalName(text: string): string {
  return text.toLowerCase();
}
