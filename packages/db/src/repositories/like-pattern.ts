/** `%query%` for ILIKE, with the wildcard characters of `query` matched literally. */
export function containsPattern(query: string): string {
  return `%${query.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}
