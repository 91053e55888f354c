/**
 * Normalises a raw keyword list: split on commas and newlines, trim,
 * lowercase, drop empties, dedupe, and sort.
 *
 * @example
 * normalizeKeywords('React, node.js\nAWS, react'); // ['aws', 'node.js', 'react']
 */
export const normalizeKeywords = (raw: string): string[] => {
  const keywords = raw
    .split(/,\s*|\n+/)
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return Array.from(new Set(keywords)).sort();
};
