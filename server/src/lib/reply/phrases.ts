// Phrase classes shared by the builder, injector, adapter, scorer and tracker

export const VAGUE_TIMELINE = /\b(soon|shortly|later|in a bit|at some point|eventually)\b/i;
export const VAGUE_TIMELINE_GLOBAL = /\b(soon|shortly|later|in a bit|at some point|eventually)\b/gi;

const WEEKDAYS = 'monday|tuesday|wednesday|thursday|friday|saturday|sunday';
const MONTHS = '(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\\.?\\s+\\d{1,2}';
const CLOCK = '\\d{1,2}(?::\\d{2})?\\s*(?:am|pm)';
const DATE = '\\d{1,2}[/-]\\d{1,2}(?:[/-]\\d{2,4})?';

export const CONCRETE_TIMELINE = new RegExp(
  `\\b(?:by|before|until)\\s+(?:the\\s+end\\s+of\\s+)?(?:this\\s+|next\\s+|the\\s+)?` +
  `(?:eod|cob|end of (?:the )?(?:day|week|month)|today|tonight|tomorrow|noon|${WEEKDAYS}|week|month|quarter|${CLOCK}|${DATE}|${MONTHS})\\b` +
  `(?:\\s+(?:today|tomorrow))?` +
  `|\\b(?:today|tonight|tomorrow|this (?:morning|afternoon|evening|week)|next week|eod)\\b`,
  'i'
);

export const COMMITTED_ACTION = /\bI(?:'ll| will)\s+(?:also\s+)?(?!get back\b)(send|share|provide|check|review|schedule|confirm|prepare|follow up|update|look into|reply|call|set up|book|forward|draft|finish|complete|deliver|fix|investigate|have|go through|let|walk|take|sign|approve|submit|upload|fill)\b/i;

export const GENERIC_FILLER = [
  /\bget back to you\b/i,
  /\btouch base\b/i,
  /\bcircle back\b/i,
  /\bhope this helps\b/i,
  /\blet me know if you have any questions\b/i,
  /\bwill look into it\b/i,
  /\bas needed\b/i
];

export const ENTHUSIASM_MARKER = /!|\bgreat question\b/i;

export function hasVagueTimeline(text: string): boolean {
  return VAGUE_TIMELINE.test(text);
}

export function hasConcreteTimeline(text: string): boolean {
  return CONCRETE_TIMELINE.test(text);
}

export function hasCommittedAction(text: string): boolean {
  return COMMITTED_ACTION.test(text);
}

export function hasGenericFiller(text: string): boolean {
  return GENERIC_FILLER.some(pattern => pattern.test(text));
}

export function hasEnthusiasm(text: string): boolean {
  return ENTHUSIASM_MARKER.test(text);
}

/**
 * Lowercased, punctuation-free form used as a phrase key
 */
export function normalizePhrase(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9']+/g, ' ').trim();
}

export function containsPhrase(text: string, phrase: string): boolean {
  const key = normalizePhrase(phrase);
  return key.length > 0 && ` ${normalizePhrase(text)} `.includes(` ${key} `);
}
