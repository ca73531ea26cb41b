export const DEFAULT_MAX_ITEMS = 100;

/**
 * Upper-cases the first `maxItems` entries of `items`, dropping the ones that
 * are empty or whitespace only. Order is preserved.
 */
export function normalizeItems(
  items: readonly string[],
  maxItems: number = DEFAULT_MAX_ITEMS
): string[] {
  if (!(maxItems > 0)) return [];

  return items
    .slice(0, maxItems)
    .filter((item) => item.trim().length > 0)
    .map((item) => item.toUpperCase());
}
