import necessityPatterns from '../../data/reply-necessity-patterns.json';
import { EmailInput, ExtractedContext, ReplyNecessity } from '../../types/reply';

export type PatternIntent =
  | 'security_alert'
  | 'transactional'
  | 'marketing'
  | 'newsletter'
  | 'announcement'
  | 'invitation'
  | 'notification';

// Checked in this order; the first match decides
const PATTERN_ORDER: readonly PatternIntent[] = [
  'security_alert',
  'transactional',
  'marketing',
  'newsletter',
  'announcement',
  'invitation',
  'notification'
];

const OUTCOMES: Record<PatternIntent, Omit<ReplyNecessity, 'emailIntent'>> = {
  security_alert: {
    needsReply: false,
    necessityLevel: 'action_only',
    reason: 'Security alert that needs action on the platform, not a reply',
    suggestedAction: 'Take action on the platform that sent the alert'
  },
  transactional: {
    needsReply: false,
    necessityLevel: 'not_needed',
    reason: 'Automated transaction confirmation',
    suggestedAction: 'File for records'
  },
  marketing: {
    needsReply: false,
    necessityLevel: 'not_needed',
    reason: 'Marketing or promotional content',
    suggestedAction: 'Review offers or unsubscribe'
  },
  newsletter: {
    needsReply: false,
    necessityLevel: 'not_needed',
    reason: 'Newsletter or periodic update',
    suggestedAction: 'Read and archive'
  },
  announcement: {
    needsReply: false,
    necessityLevel: 'optional',
    reason: 'Event announcement',
    suggestedAction: 'Add to calendar or acknowledge if interested'
  },
  invitation: {
    needsReply: true,
    necessityLevel: 'optional',
    reason: 'Event invitation, RSVP if attending',
    suggestedAction: 'RSVP or add to calendar'
  },
  notification: {
    needsReply: false,
    necessityLevel: 'not_needed',
    reason: 'Automated notification',
    suggestedAction: 'Review and mark as read'
  }
};

const NO_REPLY_SENDER = /no-?reply|donotreply|do-not-reply|mailer-daemon/i;

export type NecessityPatterns = Record<PatternIntent, readonly string[]>;

function compile(patterns: NecessityPatterns): Map<PatternIntent, RegExp[]> {
  return new Map(PATTERN_ORDER.map(intent => [
    intent,
    patterns[intent].map(source => new RegExp(source, 'i'))
  ]));
}

/**
 * Decides whether an email warrants a reply at all, before any drafting.
 */
export class ReplyNecessityAnalyzer {
  private compiled: Map<PatternIntent, RegExp[]>;

  constructor(patterns: NecessityPatterns = necessityPatterns) {
    this.compiled = compile(patterns);
  }

  analyze(email: EmailInput, context: ExtractedContext): ReplyNecessity {
    if (NO_REPLY_SENDER.test(email.senderEmail)) {
      return Object.freeze({
        needsReply: false,
        necessityLevel: 'not_needed',
        emailIntent: 'automated',
        reason: 'Automated email from a no-reply address',
        suggestedAction: 'Mark as read'
      });
    }

    const text = `${email.subject} ${email.body}`;
    for (const intent of PATTERN_ORDER) {
      const patterns = this.compiled.get(intent) || [];
      if (patterns.some(pattern => pattern.test(text))) {
        return Object.freeze({ ...OUTCOMES[intent], emailIntent: intent });
      }
    }

    if (context.questions.length > 0 || context.actionItems.length > 0) {
      return Object.freeze({
        needsReply: true,
        necessityLevel: 'required',
        emailIntent: 'request',
        reason: 'Contains direct questions or action requests',
        suggestedAction: 'Reply with answers or confirmation'
      });
    }

    if (context.emailCategory === 'question' || context.emailCategory === 'problem_report') {
      return Object.freeze({
        needsReply: true,
        necessityLevel: 'required',
        emailIntent: context.emailCategory,
        reason: `Email is a ${context.emailCategory.replace('_', ' ')}`,
        suggestedAction: 'Reply with response'
      });
    }

    return Object.freeze({
      needsReply: true,
      necessityLevel: 'optional',
      emailIntent: 'general',
      reason: 'General communication',
      suggestedAction: 'Reply if needed'
    });
  }
}
