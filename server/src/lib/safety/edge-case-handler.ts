import { EdgeCaseAnalysis, EmailInput } from '../../types/reply';

export const MIN_BODY_LENGTH = 10;
export const MIN_MEANINGFUL_WORDS = 3;
export const MAX_BODY_LENGTH = 10000;
const MAX_SENTENCES = 10;
const MIN_TEXT_RATIO = 0.5;

const NO_REPLY_SENDER = /no-?reply/i;
const NO_REPLY_CONTENT = /\b(?:do not reply|automated message|automatic notification|this is an automated)\b/i;

function analysis(partial: Partial<EdgeCaseAnalysis>): EdgeCaseAnalysis {
  return Object.freeze({
    isEdgeCase: false,
    edgeCaseType: null,
    shouldGenerateReply: true,
    recommendation: '',
    ...partial
  });
}

function textRatio(body: string): number {
  if (body.length === 0) {
    return 1;
  }
  const meaningful = body.match(/[\p{L}\s]/gu);
  return (meaningful ? meaningful.length : 0) / body.length;
}

/**
 * Emails a draft cannot sensibly answer, and ones that only deserve a flag
 */
export function analyzeEdgeCases(email: EmailInput): EdgeCaseAnalysis {
  const { body, subject, senderEmail } = email;

  if (NO_REPLY_SENDER.test(senderEmail) || NO_REPLY_CONTENT.test(`${subject} ${body}`)) {
    return analysis({
      isEdgeCase: true,
      edgeCaseType: 'no_reply',
      shouldGenerateReply: false,
      recommendation: 'This appears to be an automated email. No reply needed.'
    });
  }

  const words = body.split(/\s+/).filter(Boolean).length;
  if (body.trim().length < MIN_BODY_LENGTH && words < MIN_MEANINGFUL_WORDS) {
    return analysis({
      isEdgeCase: true,
      edgeCaseType: 'very_short',
      shouldGenerateReply: false,
      recommendation: 'Email too short to generate a meaningful reply.'
    });
  }

  if (textRatio(body) < MIN_TEXT_RATIO) {
    return analysis({
      isEdgeCase: true,
      edgeCaseType: 'unclear',
      shouldGenerateReply: false,
      recommendation: 'Email content is unclear or mostly non-text characters.'
    });
  }

  if (body.length > MAX_BODY_LENGTH) {
    return analysis({
      isEdgeCase: true,
      edgeCaseType: 'too_long',
      recommendation: 'Email is unusually long. Review for spam or bulk content.'
    });
  }

  if (body.split('.').length > MAX_SENTENCES) {
    return analysis({
      isEdgeCase: true,
      edgeCaseType: 'multiple_topics',
      recommendation: 'Email covers many topics. The reply may need manual review.'
    });
  }

  return analysis({});
}
