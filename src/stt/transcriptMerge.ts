const MAX_OVERLAP_WORDS = 10;
const STUTTER_PHRASE_WORDS = 3;
const STUTTER_LOOKAHEAD_WORDS = 10;
const STUTTER_MIN_WORDS = 7;

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word !== '');
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

function normalizeWord(word: string): string {
  return word.toLowerCase().replace(/^[^\p{L}\p{N}']+|[^\p{L}\p{N}']+$/gu, '');
}

function sameWords(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((word, index) => word === b[index]);
}

function containsSequence(haystack: string[], needle: string[]): boolean {
  if (needle.length === 0) {
    return true;
  }
  for (let start = 0; start + needle.length <= haystack.length; start += 1) {
    if (sameWords(haystack.slice(start, start + needle.length), needle)) {
      return true;
    }
  }
  return false;
}

/**
 * Length of the longest suffix of `existing` that equals a prefix of `incoming`,
 * compared on normalized words and capped at `maxOverlap`.
 */
export function overlapLength(existing: string[], incoming: string[], maxOverlap = MAX_OVERLAP_WORDS): number {
  const limit = Math.min(existing.length, incoming.length, maxOverlap);
  for (let size = limit; size > 0; size -= 1) {
    if (sameWords(existing.slice(existing.length - size), incoming.slice(0, size))) {
      return size;
    }
  }
  return 0;
}

/**
 * Merges a recognizer fragment into the buffered utterance text.
 *
 * A fragment whose words already appear contiguously in the buffer is dropped.
 * Otherwise the longest word overlap between the buffer's tail and the
 * fragment's head is removed from the fragment before appending.
 */
export function mergeTranscript(existing: string, fragment: string): string {
  const incomingWords = splitWords(fragment);
  if (incomingWords.length === 0) {
    return existing;
  }

  const existingWords = splitWords(existing);
  if (existingWords.length === 0) {
    return cleanTranscript(fragment);
  }

  const existingNormalized = existingWords.map(normalizeWord);
  const incomingNormalized = incomingWords.map(normalizeWord);

  if (containsSequence(existingNormalized, incomingNormalized)) {
    return existing;
  }

  const overlap = overlapLength(existingNormalized, incomingNormalized);
  const remainder = incomingWords.slice(overlap);
  if (remainder.length === 0) {
    return existing;
  }

  return cleanTranscript(`${existingWords.join(' ')} ${remainder.join(' ')}`);
}

function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let current = '';
  for (const char of text) {
    current += char;
    if ((char === '.' || char === '!' || char === '?') && current.trim() !== '') {
      sentences.push(current.trim());
      current = '';
    }
  }
  if (current.trim() !== '') {
    sentences.push(current.trim());
  }
  return sentences;
}

// Drops the earlier copy of a three-word phrase repeated within the lookahead window.
function suppressStutters(words: string[]): string[] {
  if (words.length < STUTTER_MIN_WORDS) {
    return words;
  }

  const lowered = words.map((word) => word.toLowerCase());
  const phraseAt = (index: number): string =>
    lowered.slice(index, index + STUTTER_PHRASE_WORDS).join(' ');

  const kept: string[] = [];
  let index = 0;
  while (index < words.length) {
    if (index + STUTTER_PHRASE_WORDS > words.length) {
      kept.push(words[index]);
      index += 1;
      continue;
    }

    const phrase = phraseAt(index);
    const lookaheadEnd = Math.min(index + STUTTER_LOOKAHEAD_WORDS, words.length - STUTTER_PHRASE_WORDS + 1);
    let repeated = false;
    for (let next = index + STUTTER_PHRASE_WORDS; next < lookaheadEnd; next += 1) {
      if (phraseAt(next) === phrase) {
        repeated = true;
        break;
      }
    }

    if (repeated) {
      index += STUTTER_PHRASE_WORDS;
    } else {
      kept.push(words[index]);
      index += 1;
    }
  }

  return kept.length > 0 ? kept : words;
}

/**
 * Collapses whitespace, removes repeated sentences and suppresses short
 * repeated phrases produced by overlapping recognizer windows.
 */
export function cleanTranscript(text: string): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (collapsed === '') {
    return '';
  }

  const unique: string[] = [];
  for (const sentence of splitSentences(collapsed)) {
    if (!unique.includes(sentence)) {
      unique.push(sentence);
    }
  }

  return suppressStutters(splitWords(unique.join(' '))).join(' ');
}

export function endsWithTerminalPunctuation(text: string): boolean {
  return /[.!?]["')\]]*\s*$/.test(text);
}
