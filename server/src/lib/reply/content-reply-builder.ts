import {
  ContentKind,
  DEFAULT_CONTENT_PRIORITY,
  EmailCategory,
  ExtractedContext,
  RelationshipTier,
  ReplyDraft,
  ReplyTone,
  SenderProfile
} from '../../types/reply';
import { BASE_CONFIDENCE } from './confidence-scorer';
import { containsPhrase, hasGenericFiller, normalizePhrase } from './phrases';
import { SIGN_OFFS, composeReply, renderGreeting } from './reply-format';

/**
 * Learned hints the builder may use. Everything here is optional input:
 * the builder produces a complete draft without it.
 */
export interface ReplyHints {
  avoidedPhrases: readonly string[];
  preferredTimeline: string | null;
}

export interface BuildReplyOptions {
  priority?: readonly ContentKind[];
}

export const OPENING_CLAUSES: Record<RelationshipTier, readonly string[]> = {
  new: ['Thank you for reaching out.', 'Thank you for your email.'],
  occasional: ['Thanks for the note.', 'Thanks for your message.'],
  frequent: ['Great to hear from you!', 'Good to hear from you.']
};

const FALLBACK_ACKNOWLEDGMENTS: Record<EmailCategory, string> = {
  scheduling: 'Thanks for reaching out about scheduling.',
  question: 'Thanks for your question.',
  request: 'Thanks for your request.',
  problem_report: 'Thanks for letting me know about this.',
  follow_up: 'Thanks for checking in.',
  update: 'Thanks for the update.',
  acknowledgment: 'Glad I could help.',
  general: 'Thanks for your message.'
};

const PRONOUN_SWAPS: Record<string, string> = {
  me: 'you',
  my: 'your',
  mine: 'yours',
  your: 'my',
  our: 'your',
  us: 'you'
};

const OBJECT_PRONOUNS = new Set(['it', 'this', 'that', 'them', 'these', 'those']);

const NON_COMMITMENT_VERBS = new Set(['be', 'please', 'also', 'just', 'you', 'i', 'we']);

// Everything from here on describes timing or reasons, not the artifact
const OBJECT_CUTOFF = /\s*(?:,|;|\s-\s|\b(?:by|before|until|due|for (?:today|tomorrow|tonight|the (?:meeting|call))|in time for|so that|so|because|when|if|as soon as|asap|today|tomorrow|tonight)\b).*$/i;

const MAX_OBJECT_WORDS = 8;

const VAGUE_WORD = /^(soon|shortly|later|eventually)$/i;

// What follows "get back", "circle back" or "touch base" in a request
const FILLER_LEAD = /^(?:back|base)\b\s*(?:(?:to|with)\s+you\b\s*)?(?:with|on|about|regarding|for)?\s*/i;

interface Commitment {
  source: string;
  verb: string;
  object: string;
  key: string;
}

function resolveObject(raw: string, topic: string): string {
  const trimmed = raw.replace(OBJECT_CUTOFF, '').replace(/[?.!]+$/, '').trim();
  const words = trimmed
    .split(/\s+/)
    .filter(word => word && !VAGUE_WORD.test(word))
    .slice(0, MAX_OBJECT_WORDS);

  const swapped = words.map(word => {
    const lower = word.toLowerCase();
    if (PRONOUN_SWAPS[lower]) {
      return PRONOUN_SWAPS[lower];
    }
    if (topic && OBJECT_PRONOUNS.has(lower)) {
      return `the ${topic}`;
    }
    return word;
  });

  return swapped.join(' ');
}

/**
 * "Can you get back to me on the budget?" asks for an answer; commit to
 * sending one instead of echoing the filler back.
 */
function answerCommitment(source: string, object: string, topic: string): Commitment {
  const subject = object.replace(FILLER_LEAD, '').trim() || (topic ? `the ${topic}` : '');
  const answer = subject ? `you an answer on ${subject}` : 'you an answer';
  return { source, verb: 'send', object: answer, key: normalizePhrase(`send ${answer}`) };
}

/**
 * Turn a request sentence into a first-person commitment:
 * "Can you send me the Q4 report?" -> send / "you the Q4 report"
 */
export function parseCommitment(actionItem: string, topic: string): Commitment | null {
  const patterns: Array<{ pattern: RegExp; verb?: string; prefix?: string }> = [
    { pattern: /\b(?:can|could|would|will)\s+you\s+(?:please\s+)?(?:also\s+)?([a-z]+)\b\s*([^?.!]*)/i },
    { pattern: /\b(?:please|kindly)\s+([a-z]+)\b\s*([^?.!]*)/i },
    { pattern: /\bneed you to\s+([a-z]+)\b\s*([^?.!]*)/i },
    { pattern: /\b(?:i|we)\s+(?:need|require|would like|want)\s+()([^?.!]*)/i, verb: 'send', prefix: 'you ' },
    { pattern: /^([a-z]+)\b\s*([^?.!]*)/i }
  ];

  for (const { pattern, verb, prefix } of patterns) {
    const match = pattern.exec(actionItem);
    if (!match) {
      continue;
    }
    const chosenVerb = (verb || match[1]).toLowerCase();
    if (NON_COMMITMENT_VERBS.has(chosenVerb)) {
      continue;
    }
    const object = resolveObject(match[2], topic);
    if (prefix && !object) {
      continue;
    }
    const fullObject = prefix ? `${prefix}${object}` : object;
    if (hasGenericFiller(`${chosenVerb} ${fullObject}`)) {
      return answerCommitment(actionItem, fullObject, topic);
    }
    return {
      source: actionItem,
      verb: chosenVerb,
      object: fullObject,
      key: normalizePhrase(`${chosenVerb} ${fullObject}`)
    };
  }

  return null;
}

/**
 * Concrete timeframe for a normalized deadline ("tomorrow" -> "by tomorrow")
 */
export function toTimeframe(deadline: string): string {
  switch (deadline) {
    case 'EOD':
      return 'by EOD';
    case 'ASAP':
      return 'today';
    case 'today':
      return 'by EOD today';
    case 'tonight':
      return 'by tonight';
    case 'tomorrow':
      return 'by tomorrow';
    case 'this week':
    case 'end of week':
      return 'by the end of this week';
    case 'next week':
      return 'early next week';
    case 'this month':
    case 'end of month':
      return 'by the end of this month';
    case 'next month':
      return 'by next month';
    case 'this quarter':
    case 'end of quarter':
      return 'by the end of this quarter';
    case 'next quarter':
      return 'by next quarter';
    default:
      return `by ${deadline}`;
  }
}

function commitmentSentence(commitment: Commitment, timeframe: string | null): string {
  const parts = ["I'll", commitment.verb, commitment.object, timeframe || ''];
  return `${parts.filter(Boolean).join(' ')}.`;
}

function pickOpening(tier: RelationshipTier, hints: ReplyHints | null): string {
  const options = OPENING_CLAUSES[tier];
  const avoided = (hints?.avoidedPhrases || []).filter(phrase => phrase.split(' ').length >= 2);
  const allowed = options.find(option => !avoided.some(phrase => containsPhrase(option, phrase)));
  return allowed || options[0];
}

function questionSentence(question: string, topic: string, timeframe: string): string {
  const subject = topic && containsPhrase(question, topic) ? `the ${topic}` : 'your question';
  if (/^when\b/i.test(question)) {
    return `I'll confirm the timing for ${subject} ${timeframe}.`;
  }
  return `I'll confirm the details on ${subject} ${timeframe}.`;
}

/**
 * Draft a reply that names what the email asked for and commits to concrete
 * actions and timeframes, in the configured content priority order.
 */
export function buildReply(
  context: ExtractedContext,
  tone: ReplyTone,
  profile: SenderProfile | null,
  hints: ReplyHints | null,
  options: BuildReplyOptions = {}
): ReplyDraft {
  const priority = options.priority || DEFAULT_CONTENT_PRIORITY;
  const tier = profile ? profile.relationship : 'new';
  const topic = context.mainTopic;
  const notes: string[] = [];

  const deadlineTimeframe = context.deadlines.length > 0 ? toTimeframe(context.deadlines[0]) : null;
  const defaultTimeframe = deadlineTimeframe || hints?.preferredTimeline || null;
  let timeframeUsed = false;

  const commitments = context.actionItems
    .map(item => parseCommitment(item, topic))
    .filter((commitment): commitment is Commitment => commitment !== null);

  const consumed = new Set<string>();
  const committedKeys = new Set<string>();
  const sentences: string[] = [];

  const takeTimeframe = (): string | null => {
    if (timeframeUsed || !defaultTimeframe) {
      return null;
    }
    timeframeUsed = true;
    return defaultTimeframe;
  };

  const commit = (commitment: Commitment, timeframe: string | null): void => {
    consumed.add(commitment.source);
    if (committedKeys.has(commitment.key)) {
      return;
    }
    committedKeys.add(commitment.key);
    sentences.push(commitmentSentence(commitment, timeframe));
  };

  const addDeadlineSentence = (): void => {
    if (!deadlineTimeframe || timeframeUsed) {
      return;
    }
    timeframeUsed = true;
    const timeframe = deadlineTimeframe;
    const commitment = commitments.find(candidate => !consumed.has(candidate.source));
    if (commitment) {
      commit(commitment, timeframe);
    } else if (topic) {
      sentences.push(`I'll have the ${topic} ready ${timeframe}.`);
    } else {
      sentences.push(`I'll follow up on this ${timeframe}.`);
    }
    notes.push('content:deadline');
  };

  for (const kind of priority) {
    switch (kind) {
      case 'deadline':
        addDeadlineSentence();
        break;
      case 'action_item': {
        const pending = commitments.filter(candidate => !consumed.has(candidate.source));
        for (const commitment of pending) {
          commit(commitment, takeTimeframe());
        }
        if (pending.length > 0) {
          notes.push('content:action_item');
        }
        break;
      }
      case 'question': {
        const open = context.questions.filter(question => !consumed.has(question));
        for (const question of open) {
          consumed.add(question);
          sentences.push(questionSentence(question, topic, takeTimeframe() || 'today'));
        }
        if (open.length > 0) {
          notes.push('content:question');
        }
        break;
      }
      case 'topic': {
        if (topic && !sentences.some(sentence => containsPhrase(sentence, topic))) {
          sentences.push(`I'll review the ${topic} and follow up ${takeTimeframe() || 'today'}.`);
          notes.push('content:topic');
        }
        break;
      }
    }
  }

  // A deadline always surfaces, even when the priority order leaves it out
  addDeadlineSentence();

  if (sentences.length > 0 && context.hasAttachments && !sentences.some(sentence => /attach/i.test(sentence))) {
    const count = context.attachmentCount;
    sentences.push(count > 1 ? `I'll go through the ${count} attachments as well.` : "I'll go through the attachment as well.");
  }

  let body: string;
  if (sentences.length === 0) {
    body = FALLBACK_ACKNOWLEDGMENTS[context.emailCategory];
    notes.push('fallback_acknowledgment');
  } else {
    body = [pickOpening(tier, hints), ...sentences].join(' ');
  }

  return {
    text: composeReply({
      greeting: renderGreeting(tone, context.senderName),
      body: [body],
      signOff: SIGN_OFFS[tone]
    }),
    confidence: BASE_CONFIDENCE,
    notes
  };
}
