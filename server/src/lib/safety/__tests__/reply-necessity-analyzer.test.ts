import { ReplyNecessityAnalyzer } from '../reply-necessity-analyzer';
import { makeEmail } from '../../__tests__/test-utils';
import { makeContext } from '../../reply/__tests__/fixtures';

describe('ReplyNecessityAnalyzer', () => {
  const analyzer = new ReplyNecessityAnalyzer();
  const plain = makeContext();

  it('should never ask for a reply to a no-reply address', () => {
    const result = analyzer.analyze(makeEmail({ senderEmail: 'donotreply@shop.example.com' }), plain);

    expect(result).toMatchObject({ needsReply: false, necessityLevel: 'not_needed', emailIntent: 'automated' });
  });

  it('should recognize transactional mail', () => {
    const email = makeEmail({ subject: 'Your receipt', body: 'Thanks for shopping with us. Total charged: 42.00' });

    expect(analyzer.analyze(email, plain)).toMatchObject({ needsReply: false, emailIntent: 'transactional' });
  });

  it('should check security alerts before anything else', () => {
    const email = makeEmail({ subject: 'Security alert', body: 'We noticed a new sign-in. Your receipt is attached.' });

    expect(analyzer.analyze(email, plain)).toMatchObject({
      needsReply: false,
      necessityLevel: 'action_only',
      emailIntent: 'security_alert'
    });
  });

  it('should treat announcements as optional without a reply', () => {
    const email = makeEmail({ subject: 'Save the date: Design summit', body: 'The summit is on March 3 in the main hall.' });

    expect(analyzer.analyze(email, plain)).toMatchObject({
      needsReply: false,
      necessityLevel: 'optional',
      emailIntent: 'announcement'
    });
  });

  it('should treat invitations as an optional reply', () => {
    const email = makeEmail({ subject: "You're invited", body: 'Join the team for the launch party on Friday.' });

    expect(analyzer.analyze(email, plain)).toMatchObject({
      needsReply: true,
      necessityLevel: 'optional',
      emailIntent: 'invitation'
    });
  });

  it('should require a reply to questions and requests', () => {
    const context = makeContext({ questions: ['when can you send me the Q4 report?'] });

    expect(analyzer.analyze(makeEmail(), context)).toMatchObject({
      needsReply: true,
      necessityLevel: 'required',
      emailIntent: 'request'
    });
  });

  it('should require a reply to problem reports', () => {
    const email = makeEmail({ subject: 'Login broken', body: 'The login page shows an error for everyone on my team.' });
    const context = makeContext({ emailCategory: 'problem_report' });

    expect(analyzer.analyze(email, context)).toEqual({
      needsReply: true,
      necessityLevel: 'required',
      emailIntent: 'problem_report',
      reason: 'Email is a problem report',
      suggestedAction: 'Reply with response'
    });
  });

  it('should leave general mail optional', () => {
    const email = makeEmail({ subject: 'Update', body: 'Thanks for the update, all good here.' });

    expect(analyzer.analyze(email, plain)).toMatchObject({
      needsReply: true,
      necessityLevel: 'optional',
      emailIntent: 'general'
    });
  });

  it('should accept its own pattern set', () => {
    const custom = new ReplyNecessityAnalyzer({
      security_alert: [],
      transactional: [],
      marketing: ['\\bflash sale\\b'],
      newsletter: [],
      announcement: [],
      invitation: [],
      notification: []
    });
    const email = makeEmail({ subject: 'Flash sale', body: 'Everything is half off this weekend.' });

    expect(custom.analyze(email, plain).emailIntent).toBe('marketing');
  });
});
