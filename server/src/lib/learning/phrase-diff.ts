import { isFunctionWord } from '../context/topic-salience';
import { hasConcreteTimeline, hasVagueTimeline } from '../reply/phrases';

export interface DiffHunk {
  deleted: string[];
  inserted: string[];
}

export interface PhraseDiff {
  similarity: number;
  hunks: DiffHunk[];
  addedPhrases: string[];
  removedPhrases: string[];
}

const MAX_PHRASE_WORDS = 15;
// Above this the LCS table is not worth building
const MAX_TABLE_CELLS = 4_000_000;

function tokenKey(token: string): string {
  return token.toLowerCase().replace(/^[^a-z0-9']+|[^a-z0-9']+$/g, '');
}

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter(token => tokenKey(token).length > 0);
}

/**
 * Word-level longest-common-subsequence diff, grouped into hunks of
 * consecutive deletions and insertions between matching words.
 */
export function diffWords(original: string[], edited: string[]): { hunks: DiffHunk[]; matched: number } {
  const a = original.map(tokenKey);
  const b = edited.map(tokenKey);
  const n = a.length;
  const m = b.length;

  if ((n + 1) * (m + 1) > MAX_TABLE_CELLS) {
    return { hunks: [{ deleted: [...original], inserted: [...edited] }], matched: 0 };
  }

  // lcs[i * (m + 1) + j] = LCS length of a[i..] and b[j..]
  const width = m + 1;
  const lcs = new Uint32Array((n + 1) * width);
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i * width + j] = a[i] === b[j]
        ? lcs[(i + 1) * width + j + 1] + 1
        : Math.max(lcs[(i + 1) * width + j], lcs[i * width + j + 1]);
    }
  }

  const hunks: DiffHunk[] = [];
  let current: DiffHunk = { deleted: [], inserted: [] };
  const closeHunk = () => {
    if (current.deleted.length > 0 || current.inserted.length > 0) {
      hunks.push(current);
      current = { deleted: [], inserted: [] };
    }
  };

  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    if (i < n && j < m && a[i] === b[j]) {
      closeHunk();
      i++;
      j++;
    } else if (j >= m || (i < n && lcs[(i + 1) * width + j] >= lcs[i * width + j + 1])) {
      current.deleted.push(original[i]);
      i++;
    } else {
      current.inserted.push(edited[j]);
      j++;
    }
  }
  closeHunk();

  return { hunks, matched: lcs[0] };
}

/**
 * Split a run of words into phrases at sentence ends, dropping runs that are
 * too long to be a reusable phrase or only function words. Timing words
 * ("soon", "by EOD") are kept even though they are function words.
 */
export function runToPhrases(tokens: string[]): string[] {
  const phrases: string[] = [];
  let buffer: string[] = [];

  const emit = () => {
    const words = buffer.map(token => token.replace(/^[^A-Za-z0-9']+|[^A-Za-z0-9']+$/g, '')).filter(Boolean);
    buffer = [];
    if (words.length === 0 || words.length > MAX_PHRASE_WORDS) {
      return;
    }
    const phrase = words.join(' ');
    if (words.every(isFunctionWord) && !hasConcreteTimeline(phrase) && !hasVagueTimeline(phrase)) {
      return;
    }
    phrases.push(phrase);
  };

  for (const token of tokens) {
    buffer.push(token);
    if (/[.!?]["')\]]*$/.test(token)) {
      emit();
    }
  }
  emit();

  return phrases;
}

export function diffPhrases(generatedText: string, sentText: string): PhraseDiff {
  const original = tokenize(generatedText);
  const edited = tokenize(sentText);
  const { hunks, matched } = diffWords(original, edited);

  const total = original.length + edited.length;
  const similarity = total === 0 ? 1 : Math.round((2 * matched / total) * 10000) / 10000;

  return {
    similarity,
    hunks,
    addedPhrases: hunks.flatMap(hunk => runToPhrases(hunk.inserted)),
    removedPhrases: hunks.flatMap(hunk => runToPhrases(hunk.deleted))
  };
}
