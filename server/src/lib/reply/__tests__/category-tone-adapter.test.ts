import { adaptForCategory, categoryNudge, targetRegister } from '../category-tone-adapter';

describe('Category Tone Adapter', () => {
  it('should soften the register for frequent senders', () => {
    const result = adaptForCategory(
      "Hello Sarah,\n\nGood to hear from you. I'll send you the Q4 report by tomorrow.\n\nBest regards",
      'request',
      0.8,
      { relationship: 'frequent', tone: 'business' }
    );

    expect(result.text).toBe("Hi Sarah,\n\nGood to hear from you. I'll send you the Q4 report by tomorrow.\n\nCheers");
    expect(result.delta).toBe(0.05);
    expect(result.confidence).toBe(0.85);
    expect(result.record).toEqual({
      original: 'business',
      adapted: 'casual',
      reason: 'frequent sender, request email',
      changes: ['greeting:casual', 'sign_off:casual']
    });
  });

  it('should keep new senders out of the casual register', () => {
    const result = adaptForCategory('Hi Sam,\n\nThanks for the update.\n\nCheers', 'update', 0.5, {
      relationship: 'new',
      tone: 'casual'
    });

    expect(result.text).toBe('Hello Sam,\n\nThanks for the update.\n\nBest regards');
    expect(result.delta).toBe(-0.05);
    expect(result.confidence).toBe(0.45);
  });

  it('should offer time slots for scheduling mail without one', () => {
    const result = adaptForCategory(
      "Hello Sam,\n\nThank you for your email. I'll confirm the details on your question today.\n\nBest regards",
      'scheduling',
      0.7,
      { relationship: 'occasional', tone: 'business' }
    );

    expect(result.text).toBe(
      "Hello Sam,\n\nThank you for your email. I'll confirm the details on your question today. I'll check my calendar and send over two time slots today.\n\nBest regards"
    );
    expect(result.delta).toBe(0.05);
    expect(result.record?.changes).toEqual(['scheduling:time_slots']);
  });

  it('should drop the pleasantry from a long follow-up', () => {
    const result = adaptForCategory(
      "Hello Sam,\n\nThanks for the note. I'll review the launch plan and follow up today. I'll send the summary by Friday.\n\nBest regards",
      'follow_up',
      0.7,
      { relationship: 'occasional', tone: 'business' }
    );

    expect(result.text).toBe(
      "Hello Sam,\n\nI'll review the launch plan and follow up today. I'll send the summary by Friday.\n\nBest regards"
    );
    expect(result.record?.changes).toEqual(['brevity:dropped_opening']);
  });

  it('should report no adaptation when nothing changed', () => {
    const result = adaptForCategory(
      "Hello Sam,\n\nThanks for the note. I'll share the deck by EOD.\n\nBest regards",
      'request',
      0.8,
      { relationship: 'occasional', tone: 'business' }
    );

    expect(result.record).toBeNull();
    expect(result.confidence).toBe(0.85);
  });

  it('should map registers by relationship', () => {
    expect(targetRegister('formal', 'frequent')).toBe('business');
    expect(targetRegister('casual', 'frequent')).toBe('casual');
    expect(targetRegister('casual', 'new')).toBe('business');
    expect(targetRegister('formal', 'occasional')).toBe('formal');
  });

  it('should only reward anchors the category calls for', () => {
    expect(categoryNudge("I'll send the summary by Friday.", 'follow_up')).toBe(0.05);
    expect(categoryNudge("I'll send the summary.", 'follow_up')).toBe(0);
    expect(categoryNudge('Thanks for the update.', 'update')).toBe(-0.05);
  });
});
