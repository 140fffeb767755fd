// Sentence-level patterns used by the context extractor

export const QUESTION_LEAD = /^(who|what|when|where|why|how|which)\b/i;

export const DIRECTED_AT_READER = [
  /\b(you|your|yours|you're|you'll|you've)\b/i,
  /\bplease (let|tell|send|provide|confirm|advise)\b/i,
  /\bneed (you to|your)\b/i
];

export const RHETORICAL = [
  /\bisn't (it|that) (great|amazing|wonderful|exciting)\b/i,
  /\bwho doesn't (love|want|like)\b/i,
  /\bwhat could be (better|more)\b/i,
  /\b(right|correct)\?$/i
];

export const DIRECT_REQUEST = [
  /\b(please|kindly)\s+[a-z]+/i,
  /\b(can|could|would|will)\s+you\s+(please\s+)?[a-z]+/i,
  /\bneed (you|your)\b/i,
  /\byou (need|must|should|have) to\b/i,
  /\b(action (required|needed)|require (your|you to))\b/i
];

export const SENDER_NEED = /\b(i|we)\s+(need|require|would like|want)\b/i;

export const PAST_ACTION = [
  /\b(has been|have been|was|were) (sent|completed|updated|processed|uploaded|submitted)\b/i,
  /\b(sent|completed|updated|processed|uploaded|submitted|registered|confirmed) (on|at|yesterday|last)\b/i,
  /\b(already|previously) (sent|completed|updated|processed|done)\b/i
];

// Verbs that open an imperative request ("Send me the deck.")
export const IMPERATIVE_VERBS = [
  'send', 'share', 'provide', 'submit', 'complete', 'review', 'confirm', 'fill',
  'forward', 'upload', 'sign', 'approve', 'update', 'check', 'call', 'email',
  'reply', 'respond', 'schedule', 'book', 'prepare', 'attach', 'remember', 'let'
];

export const GREETING_LINE = /^(hi|hello|hey|dear|good (morning|afternoon|evening))\b[^.!?]{0,40},?$/i;

export const SIGN_OFF_LINE = /^(thanks|thank you|many thanks|best|best regards|kind regards|regards|cheers|sincerely|yours truly|talk soon)[!,.]?$/i;

export const URGENT_KEYWORDS = /\b(urgent|asap|emergency|critical|immediately|right away)\b/i;

const WEEKDAYS = 'monday|tuesday|wednesday|thursday|friday|saturday|sunday';
const MONTHS = 'jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|jun(?:e)?|jul(?:y)?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?';

export interface DeadlineRule {
  pattern: RegExp;
  normalize: (match: RegExpMatchArray) => string;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Deadline expressions and their normalized form. All patterns are global
 * so the extractor can collect every occurrence with its position.
 */
export const DEADLINE_RULES: DeadlineRule[] = [
  {
    pattern: /\b(?:eod|cob|end of (?:the )?day|close of business)\b/gi,
    normalize: () => 'EOD'
  },
  {
    pattern: /\b(?:asap|as soon as possible|immediately|right away)\b/gi,
    normalize: () => 'ASAP'
  },
  {
    pattern: /\b(today|tonight|tomorrow)\b/gi,
    normalize: match => match[1].toLowerCase()
  },
  {
    pattern: new RegExp(`\\b(next\\s+)?(${WEEKDAYS})\\b`, 'gi'),
    normalize: match => `${match[1] ? 'next ' : ''}${capitalize(match[2])}`
  },
  {
    pattern: /\b(this|next)\s+(week|month|quarter)\b/gi,
    normalize: match => `${match[1].toLowerCase()} ${match[2].toLowerCase()}`
  },
  {
    pattern: /\bend of (?:the )?(week|month|quarter)\b/gi,
    normalize: match => `end of ${match[1].toLowerCase()}`
  },
  {
    pattern: /\b(\d{1,2}[/-]\d{1,2}(?:[/-]\d{2,4})?)\b/g,
    normalize: match => match[1]
  },
  {
    pattern: new RegExp(`\\b(${MONTHS})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b`, 'gi'),
    normalize: match => `${capitalize(match[1])} ${match[2]}`
  },
  {
    pattern: /\b(?:by|before|until|at)\s+(\d{1,2}(?::\d{2})?)\s*(am|pm)\b/gi,
    normalize: match => `${match[1]}${match[2].toLowerCase()}`
  }
];

export const MAX_QUESTIONS = 3;
export const MAX_ACTION_ITEMS = 3;
export const MAX_DEADLINES = 3;
export const MAX_ACTION_LENGTH = 150;
