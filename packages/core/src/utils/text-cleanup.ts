/**
 * OCR text cleanup.
 * Screens are full of URLs, icons and box-drawing noise that OCR turns into
 * stray symbols; summarizers do better without them.
 */

const URL_PATTERN = /https?:\/\/\S+|www\.\S+/gi;
// Keeps letters, digits, whitespace and sentence punctuation
const NOISE_PATTERN = /[^\p{L}\p{N}\s.,!?':;-]/gu;
const WHITESPACE_PATTERN = /\s+/g;

export function cleanOcrText(text: string): string {
  return text
    .replace(URL_PATTERN, ' ')
    .replace(NOISE_PATTERN, ' ')
    .replace(WHITESPACE_PATTERN, ' ')
    .trim();
}
