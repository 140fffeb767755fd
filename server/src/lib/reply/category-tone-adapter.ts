import {
  EmailCategory,
  RelationshipTier,
  ReplyTone,
  ToneAdaptationRecord
} from '../../types/reply';
import { clampScore } from './confidence-scorer';
import { OPENING_CLAUSES } from './content-reply-builder';
import { hasCommittedAction, hasConcreteTimeline } from './phrases';
import {
  SIGN_OFFS,
  composeReply,
  greetingRegister,
  renderGreeting,
  signOffTone,
  splitReply,
  splitSentences
} from './reply-format';

export const CONFIDENCE_NUDGE = 0.05;

const SOFTER: Record<ReplyTone, ReplyTone> = {
  formal: 'business',
  business: 'casual',
  casual: 'casual'
};

const TIME_SLOT_ANCHOR = /\b(?:\d{1,2}(?::\d{2})?\s*(?:am|pm)|time slots?|monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b/i;

const SLOT_OFFER = "I'll check my calendar and send over two time slots today.";

const BRIEF_CATEGORIES: readonly EmailCategory[] = ['general', 'acknowledgment', 'follow_up'];

const OPENERS = new Set(Object.values(OPENING_CLAUSES).flat());

export interface AdaptOptions {
  relationship: RelationshipTier;
  tone: ReplyTone;
}

export interface ToneAdaptationResult {
  text: string;
  confidence: number;
  delta: number;
  record: ToneAdaptationRecord | null;
}

export function targetRegister(current: ReplyTone, relationship: RelationshipTier): ReplyTone {
  if (relationship === 'frequent') {
    return SOFTER[current];
  }
  if (relationship === 'new' && current === 'casual') {
    return 'business';
  }
  return current;
}

function hasCategoryAnchor(text: string, category: EmailCategory): boolean {
  switch (category) {
    case 'scheduling':
      return TIME_SLOT_ANCHOR.test(text);
    case 'request':
    case 'problem_report':
      return hasCommittedAction(text);
    case 'question':
      return hasCommittedAction(text) || hasConcreteTimeline(text);
    case 'follow_up':
      return hasConcreteTimeline(text);
    default:
      return false;
  }
}

/**
 * Confidence nudge for the final text: low-information drafts lose a little,
 * drafts carrying what their category calls for gain a little.
 */
export function categoryNudge(text: string, category: EmailCategory): number {
  if (!hasCommittedAction(text) && !hasConcreteTimeline(text)) {
    return -CONFIDENCE_NUDGE;
  }
  return hasCategoryAnchor(text, category) ? CONFIDENCE_NUDGE : 0;
}

/**
 * Shift the register to suit the relationship and shape the body for the
 * email's category.
 */
export function adaptForCategory(
  text: string,
  category: EmailCategory,
  confidence: number,
  options: AdaptOptions
): ToneAdaptationResult {
  const parts = splitReply(text);
  const body = [...parts.body];
  const changes: string[] = [];

  const greeting = parts.greeting ? greetingRegister(parts.greeting) : null;
  const current = greeting?.tone || (parts.signOff ? signOffTone(parts.signOff) : null) || options.tone;
  const adapted = targetRegister(current, options.relationship);

  let greetingLine = parts.greeting;
  let signOff = parts.signOff;
  if (adapted !== current) {
    if (greeting) {
      greetingLine = renderGreeting(adapted, greeting.name);
      changes.push(`greeting:${adapted}`);
    }
    if (signOff) {
      signOff = SIGN_OFFS[adapted];
      changes.push(`sign_off:${adapted}`);
    }
  }

  if (body.length > 0) {
    if (category === 'scheduling' && !TIME_SLOT_ANCHOR.test(body.join(' '))) {
      body[body.length - 1] = `${body[body.length - 1]} ${SLOT_OFFER}`;
      changes.push('scheduling:time_slots');
    }

    if (BRIEF_CATEGORIES.includes(category)) {
      const sentences = body.flatMap(paragraph => splitSentences(paragraph));
      const first = splitSentences(body[0]);
      if (sentences.length >= 3 && first.length > 0 && OPENERS.has(first[0])) {
        const rest = first.slice(1).join(' ');
        if (rest) {
          body[0] = rest;
        } else {
          body.shift();
        }
        changes.push('brevity:dropped_opening');
      }
    }
  }

  const adaptedText = composeReply({ greeting: greetingLine, body, signOff });
  const delta = categoryNudge(adaptedText, category);

  const record: ToneAdaptationRecord | null = changes.length > 0
    ? {
      original: current,
      adapted,
      reason: `${options.relationship} sender, ${category} email`,
      changes
    }
    : null;

  return {
    text: adaptedText,
    confidence: clampScore(confidence + delta),
    delta,
    record
  };
}
