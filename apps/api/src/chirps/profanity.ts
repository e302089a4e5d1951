const PROFANE_WORDS = ['kerfuffle', 'sharbert', 'fornax'];
const REPLACEMENT = '****';

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Mask profane words written in lower case or capitalized.
 * Matching is by substring, so words embedded in longer ones are masked too.
 */
export function cleanProfanity(text: string): string {
  return PROFANE_WORDS.reduce(
    (cleaned, word) =>
      cleaned.replaceAll(capitalize(word), REPLACEMENT).replaceAll(word, REPLACEMENT),
    text,
  );
}
