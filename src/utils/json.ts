/**
 * Strips a surrounding markdown code fence, which models like to add even
 * when asked for bare JSON.
 */
export function cleanJsonResponse(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith("```")) {
    const lines = cleaned.split("\n");
    cleaned = lines.slice(1).join("\n");
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3).trim();
  }
  return cleaned;
}

/**
 * Parses the JSON value in a model reply. Tries the whole (de-fenced) reply
 * first, then the outermost `{...}` or `[...]` span, starting with
 * whichever opens earlier. Returns `undefined` when nothing parses.
 */
export function extractJson(text: string): unknown {
  const cleaned = cleanJsonResponse(text);
  if (!cleaned) return undefined;

  try {
    return JSON.parse(cleaned);
  } catch {
    // fall through to span matching
  }

  // try the shape whose bracket opens first
  const spans = [
    { open: cleaned.indexOf("{"), pattern: /\{[\s\S]*\}/ },
    { open: cleaned.indexOf("["), pattern: /\[[\s\S]*\]/ },
  ]
    .filter((span) => span.open !== -1)
    .sort((a, b) => a.open - b.open);

  for (const { pattern } of spans) {
    const match = cleaned.match(pattern);
    if (!match) continue;
    try {
      return JSON.parse(match[0]);
    } catch {
      // try the next shape
    }
  }
  return undefined;
}
