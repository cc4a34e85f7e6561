const PLACEHOLDER_PATTERN = /[～〜~]/g;
const EDGE_PUNCTUATION_PATTERN = /^[\p{P}\p{S}\s]+|[\p{P}\p{S}\s]+$/gu;

export function toNfc(value: string): string {
  return value.normalize("NFC");
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ");
}

export function normaliseText(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = collapseWhitespace(value).trim();
  if (!trimmed) {
    return null;
  }
  return toNfc(trimmed);
}

/**
 * Comparable form of an answer or meaning: case-folded, without the wave-dash
 * placeholder grammar meanings use, and without punctuation at either end.
 * Text made only of punctuation keeps its case-folded form.
 */
export function normaliseAnswer(value: string): string {
  const folded = normaliseText(value)?.toLowerCase();
  if (!folded) {
    return "";
  }
  const withoutPlaceholders = collapseWhitespace(folded.replace(PLACEHOLDER_PATTERN, " ")).trim();
  const stripped = withoutPlaceholders.replace(EDGE_PUNCTUATION_PATTERN, "");
  return stripped || folded;
}
