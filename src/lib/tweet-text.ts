import { MAX_TWEET_LENGTH } from './twitter-client-constants.js';
import { ValidationError } from './errors.js';

// Code point ranges the platform counts as weight 1; everything else (CJK, ...) counts 2.
const LIGHT_RANGES: Array<[number, number]> = [
  [0, 4351],
  [8192, 8205],
  [8208, 8223],
  [8242, 8247],
];

// Scheme URLs, plus bare domains under a handful of common TLDs. Other bare
// domains (example.xyz, example.ai/path) are counted character by character.
const URL_PATTERN =
  /https?:\/\/\S+|(?<![@\w.-])(?:[a-z0-9-]+\.)+(?:com|org|net|io|dev|co|me|app|gov|edu)(?![\w-])(?:\/\S*)?/gi;
const TRANSFORMED_URL_LENGTH = 23;

// An emoji sequence (ZWJ family, flag, keycap, variation selector) counts 2 as a whole.
const EMOJI_CLUSTER = /[\p{Extended_Pictographic}\p{Regional_Indicator}\u20E3]/u;

const graphemes = new Intl.Segmenter('en', { granularity: 'grapheme' });

function weightOf(codePoint: number): number {
  return LIGHT_RANGES.some(([start, end]) => codePoint >= start && codePoint <= end) ? 1 : 2;
}

/**
 * Length as the composer counts it: weighted code points, every emoji
 * sequence as 2, every URL as 23.
 */
export function weightedLength(text: string): number {
  let length = 0;
  const rest = text.normalize('NFC').replace(URL_PATTERN, () => {
    length += TRANSFORMED_URL_LENGTH;
    return '';
  });

  for (const { segment } of graphemes.segment(rest)) {
    if (EMOJI_CLUSTER.test(segment)) {
      length += 2;
      continue;
    }
    for (const char of segment) {
      const codePoint = char.codePointAt(0);
      if (codePoint !== undefined) {
        length += weightOf(codePoint);
      }
    }
  }
  return length;
}

export function validateTweetText(text: string, options: { hasMedia?: boolean } = {}): void {
  if (text.trim().length === 0 && !options.hasMedia) {
    throw new ValidationError('Tweet text is empty');
  }
  const length = weightedLength(text);
  if (length > MAX_TWEET_LENGTH) {
    throw new ValidationError(`Tweet is ${length} characters; the limit is ${MAX_TWEET_LENGTH}`);
  }
}
