/**
 * Matching key for voice commands: lowercase, every character other than a
 * letter, digit, underscore or whitespace replaced by a space, whitespace
 * collapsed.
 */
export function sanitizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Removes every case-insensitive occurrence of `phrase` (words separated by any whitespace) and trims. */
export function removeCommandPhrase(text: string, phrase: string): string {
  const words = phrase.trim().split(/\s+/).filter(Boolean).map(escapeRegExp);
  if (!words.length) return text.trim();
  const pattern = new RegExp(words.join('\\s+'), 'gi');
  return text.replace(pattern, '').trim();
}
