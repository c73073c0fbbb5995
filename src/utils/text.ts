export const ELLIPSIS = '...';

/**
 * Cut `value` to `maxChars`, appending an ellipsis marker when anything was dropped
 */
export function truncateWithEllipsis(value: string | null, maxChars: number): string | null {
  if (value === null || value.length <= maxChars) {
    return value;
  }
  return value.slice(0, maxChars) + ELLIPSIS;
}

/**
 * Escape LIKE/ILIKE metacharacters so user input matches literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
