import stopwords from '../../data/stopwords.json';

const FUNCTION_WORDS = new Set(stopwords.function);
const IGNORED_WORDS = new Set([...stopwords.function, ...stopwords.email]);

const SUBJECT_WEIGHT = 2;
const BODY_WEIGHT = 1;
const MAX_TOPIC_WORDS = 3;

const TOKEN = /[A-Za-z0-9][A-Za-z0-9'&-]*/g;

interface Token {
  text: string;
  term: string;
  start: number;
  end: number;
}

export function normalizeTerm(word: string): string {
  return word.toLowerCase().replace(/'s$/, '');
}

export function isFunctionWord(word: string): boolean {
  return FUNCTION_WORDS.has(normalizeTerm(word));
}

export function isSalientTerm(term: string): boolean {
  return term.length >= 2 && !/^\d+$/.test(term) && !IGNORED_WORDS.has(term);
}

function tokenize(text: string): Token[] {
  return Array.from(text.matchAll(TOKEN), match => {
    const start = match.index ?? 0;
    return {
      text: match[0],
      term: normalizeTerm(match[0]),
      start,
      end: start + match[0].length
    };
  });
}

export function stripSubjectPrefixes(subject: string): string {
  return subject.replace(/^\s*((re|fwd?|aw)\s*:\s*)+/i, '').trim();
}

/**
 * Pick the most salient term across subject and body, then grow it into a
 * short phrase from its neighbours in the original text ("Q4" -> "Q4 report").
 * Returns an empty string when nothing salient is present.
 */
export function findMainTopic(subject: string, body: string): string {
  const sources = [
    { text: stripSubjectPrefixes(subject), weight: SUBJECT_WEIGHT },
    { text: body, weight: BODY_WEIGHT }
  ];

  const scores = new Map<string, number>();
  const order: string[] = [];

  for (const source of sources) {
    for (const token of tokenize(source.text)) {
      if (!isSalientTerm(token.term)) {
        continue;
      }
      if (!scores.has(token.term)) {
        order.push(token.term);
      }
      scores.set(token.term, (scores.get(token.term) || 0) + source.weight);
    }
  }

  let best = '';
  let bestScore = 0;
  // First-seen order breaks ties
  for (const term of order) {
    const score = scores.get(term) || 0;
    if (score > bestScore) {
      best = term;
      bestScore = score;
    }
  }

  if (!best) {
    return '';
  }

  for (const source of [sources[1], sources[0]]) {
    const phrase = expandAround(source.text, best);
    if (phrase) {
      return phrase;
    }
  }
  return '';
}

function expandAround(text: string, term: string): string {
  const tokens = tokenize(text);
  const index = tokens.findIndex(token => token.term === term);
  if (index === -1) {
    return '';
  }

  const adjacent = (left: Token, right: Token) => /^[ \t]+$/.test(text.slice(left.end, right.start));

  let first = index;
  let last = index;
  while (last - first + 1 < MAX_TOPIC_WORDS) {
    const next = tokens[last + 1];
    const previous = tokens[first - 1];
    if (next && isSalientTerm(next.term) && adjacent(tokens[last], next)) {
      last++;
    } else if (previous && isSalientTerm(previous.term) && adjacent(previous, tokens[first])) {
      first--;
    } else {
      break;
    }
  }

  return text.slice(tokens[first].start, tokens[last].end).replace(/'s$/i, '');
}
