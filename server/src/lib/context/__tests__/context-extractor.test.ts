import { coreBodyLines, extractContext, firstName } from '../context-extractor';
import { NlpHandle, createNlpHandle } from '../../nlp/nlp-handle';
import { makeEmail, quietLogger } from '../../__tests__/test-utils';

class BrokenNlpHandle extends NlpHandle {
  splitSentences(): string[] {
    throw new Error('tokenizer unavailable');
  }
}

describe('Context Extractor', () => {
  const nlp = createNlpHandle();

  describe('extractContext', () => {
    it('should pull questions, requests and the deadline out of a timeline question', () => {
      const context = extractContext(makeEmail(), nlp);

      expect(context.questions).toEqual(['when can you send me the Q4 report?']);
      expect(context.actionItems).toEqual([
        'when can you send me the Q4 report?',
        "I need it for tomorrow's meeting."
      ]);
      expect(context.deadlines).toEqual(['tomorrow']);
      expect(context.mainTopic).toBe('Q4 report');
      expect(context.emailCategory).toBe('request');
      expect(context.urgencyLevel).toBe('high');
      expect(context.senderName).toBe('Sarah');
      expect(context.extractedSuccessfully).toBe(true);
    });

    it('should ignore the greeting and everything after the sign-off', () => {
      const context = extractContext(makeEmail({
        subject: 'Budget draft',
        body: 'Hi Sarah,\nCould you review the budget draft by Friday?\nThanks,\nMark\nmark@example.com'
      }), nlp);

      expect(context.questions).toEqual(['Could you review the budget draft by Friday?']);
      expect(context.actionItems).toEqual(['Could you review the budget draft by Friday?']);
      expect(context.deadlines).toEqual(['Friday']);
    });

    it('should leave out rhetorical questions', () => {
      const context = extractContext(makeEmail({
        subject: 'Launch',
        body: 'You did a great job on the launch, right? Can you share the launch notes with the team?'
      }), nlp);

      expect(context.questions).toEqual(['Can you share the launch notes with the team?']);
    });

    it('should not treat completed actions as requests', () => {
      const context = extractContext(makeEmail({
        subject: 'Delivery',
        body: 'Please note the files have been uploaded. Please confirm the delivery address.'
      }), nlp);

      expect(context.actionItems).toEqual(['Please confirm the delivery address.']);
    });

    it('should normalize deadlines in the order they appear', () => {
      const context = extractContext(makeEmail({
        subject: 'Slides',
        body: 'Please send the slides by EOD Friday, and the budget by March 15.'
      }), nlp);

      expect(context.deadlines).toEqual(['EOD', 'Friday', 'March 15']);
      expect(context.urgencyLevel).toBe('high');
    });

    it('should flag urgent wording', () => {
      const context = extractContext(makeEmail({ subject: 'Server', body: 'This is urgent, please call me.' }), nlp);

      expect(context.urgencyLevel).toBe('urgent');
    });

    it('should collect quoted and capitalized key phrases', () => {
      const context = extractContext(makeEmail({
        subject: 'Plan',
        body: 'Please review the "Atlas rollout" plan before the NOON sync.'
      }), nlp);

      expect(context.keyPhrases).toEqual(['Atlas rollout', 'NOON']);
    });

    it('should return an empty topic and a follow-up category for a vague check-in', () => {
      const context = extractContext(makeEmail({ subject: 'Question', body: 'Just checking in on things.' }), nlp);

      expect(context.mainTopic).toBe('');
      expect(context.questions).toEqual([]);
      expect(context.actionItems).toEqual([]);
      expect(context.deadlines).toEqual([]);
      expect(context.emailCategory).toBe('follow_up');
    });

    it('should fall back to an empty context when parsing fails', () => {
      const logger = quietLogger();
      const context = extractContext(makeEmail(), new BrokenNlpHandle(), logger);

      expect(context.extractedSuccessfully).toBe(false);
      expect(context.questions).toEqual([]);
      expect(context.mainTopic).toBe('');
      expect(context.emailCategory).toBe('general');
      expect(context.senderName).toBe('Sarah');

      const [entry] = logger.getLogs('sarah@example.com');
      expect(entry.level).toBe('warn');
      expect(entry.event).toBe('extraction_failed');
    });

    it('should return a frozen record', () => {
      expect(Object.isFrozen(extractContext(makeEmail(), nlp))).toBe(true);
    });
  });

  describe('helpers', () => {
    it('should use the first name only', () => {
      expect(firstName('Sarah Chen')).toBe('Sarah');
      expect(firstName('sarah@example.com')).toBe('');
      expect(firstName(undefined)).toBe('');
    });

    it('should stop at the sign-off line', () => {
      expect(coreBodyLines('Hello team,\n\nThe build is green.\nBest regards\nAlex')).toEqual(['The build is green.']);
    });
  });
});
