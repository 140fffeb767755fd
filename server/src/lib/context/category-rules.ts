import { EmailCategory } from '../../types/reply';
import { NlpHandle } from '../nlp/nlp-handle';

export interface CategorySignals {
  text: string;
  questions: readonly string[];
  actionItems: readonly string[];
  nlp: NlpHandle;
}

export interface CategoryRule {
  category: EmailCategory;
  matches: (signals: CategorySignals) => boolean;
}

const SCHEDULING_TERMS = '(schedule|reschedule|scheduling|calendar|availability|available|appointment|time slot|time slots|set up a call|set up a meeting|find a time|meet on|free on)';
const PROBLEM_TERMS = '(problem|problems|issue|issues|error|errors|bug|bugs|broken|crash|crashed|crashing|failing|failed|outage|not working)';
const FOLLOW_UP_TERMS = '(follow up|following up|checking in|check in|circling back|any update|any updates|status)';
const UPDATE_TERMS = '(update|updates|fyi|heads up|progress|completed|finished|shipped|released|launched)';
const THANKS_TERMS = '(thanks|thank|appreciate|appreciated|grateful)';

/**
 * Ordered classification table. The first matching rule decides the
 * category, so more specific signals sit above broader ones.
 */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    category: 'scheduling',
    matches: ({ text, nlp }) => nlp.matches(text, SCHEDULING_TERMS)
  },
  {
    category: 'question',
    matches: ({ questions, actionItems }) => questions.length > 0 && actionItems.length === 0
  },
  {
    category: 'request',
    matches: ({ actionItems }) => actionItems.length > 0
  },
  {
    category: 'problem_report',
    matches: ({ text, nlp }) => nlp.matches(text, PROBLEM_TERMS)
  },
  {
    category: 'follow_up',
    matches: ({ text, nlp }) => nlp.matches(text, FOLLOW_UP_TERMS)
  },
  {
    category: 'update',
    matches: ({ text, nlp }) => nlp.matches(text, UPDATE_TERMS)
  },
  {
    category: 'acknowledgment',
    matches: ({ text, nlp }) => nlp.matches(text, THANKS_TERMS)
  }
];

export function classifyEmail(
  signals: CategorySignals,
  rules: readonly CategoryRule[] = CATEGORY_RULES
): EmailCategory {
  const rule = rules.find(candidate => candidate.matches(signals));
  return rule ? rule.category : 'general';
}
