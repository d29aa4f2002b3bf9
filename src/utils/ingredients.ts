/**
 * Splits raw user input on commas, semicolons and newlines.
 */
export function splitIngredientText(text: string): string[] {
  return text
    .split(/[,;\n]+/)
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Trims, lower-cases and removes repeats while keeping first-seen order.
 */
export function dedupeIngredients(items: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const item of items) {
    const key = item.trim().replace(/\s+/g, " ").toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    result.push(key);
  }
  return result;
}
