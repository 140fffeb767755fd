import { EmailInput, ExtractedContext, UrgencyLevel } from '../../types/reply';
import { ExtractionFailure, errorMessage } from '../../types/errors';
import { NlpHandle } from '../nlp/nlp-handle';
import { ReplyLogger } from '../reply-logger';
import { classifyEmail } from './category-rules';
import { findMainTopic, stripSubjectPrefixes } from './topic-salience';
import {
  DEADLINE_RULES,
  DIRECT_REQUEST,
  DIRECTED_AT_READER,
  GREETING_LINE,
  IMPERATIVE_VERBS,
  MAX_ACTION_ITEMS,
  MAX_ACTION_LENGTH,
  MAX_DEADLINES,
  MAX_QUESTIONS,
  PAST_ACTION,
  QUESTION_LEAD,
  RHETORICAL,
  SENDER_NEED,
  SIGN_OFF_LINE,
  URGENT_KEYWORDS
} from './patterns';

const MIN_QUESTION_LENGTH = 10;

export function emptyContext(email?: Partial<EmailInput>): ExtractedContext {
  return Object.freeze({
    questions: [],
    actionItems: [],
    deadlines: [],
    mainTopic: '',
    emailCategory: 'general',
    urgencyLevel: 'normal',
    keyPhrases: [],
    senderName: firstName(email?.senderName),
    subject: typeof email?.subject === 'string' ? email.subject : '',
    hasAttachments: Boolean(email?.hasAttachments),
    attachmentCount: email?.attachmentCount ?? 0,
    extractedSuccessfully: false
  });
}

export function firstName(senderName: string | undefined): string {
  if (typeof senderName !== 'string') {
    return '';
  }
  const first = senderName.replace(/["']/g, '').trim().split(/\s+/)[0] || '';
  return first.includes('@') ? '' : first;
}

/**
 * Lines between the greeting and the sign-off. Anything after a sign-off
 * line is treated as the signature block.
 */
export function coreBodyLines(body: string): string[] {
  const lines: string[] = [];
  for (const raw of body.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) {
      continue;
    }
    if (SIGN_OFF_LINE.test(line)) {
      break;
    }
    if (lines.length === 0 && GREETING_LINE.test(line)) {
      continue;
    }
    lines.push(line);
  }
  return lines;
}

function isQuestion(sentence: string): boolean {
  const candidate = sentence.endsWith('?') ||
    (QUESTION_LEAD.test(sentence) && /\byou\b/i.test(sentence));
  if (!candidate || sentence.length < MIN_QUESTION_LENGTH) {
    return false;
  }
  const directed = QUESTION_LEAD.test(sentence) ||
    /^(can|could|would|will|do|did|have|are|is|should)\s+you\b/i.test(sentence) ||
    DIRECTED_AT_READER.some(pattern => pattern.test(sentence));
  return directed && !RHETORICAL.some(pattern => pattern.test(sentence));
}

function isActionItem(sentence: string, nlp: NlpHandle): boolean {
  const leadVerb = sentence.split(/\s+/)[0].toLowerCase().replace(/[^a-z]/g, '');
  const directRequest = DIRECT_REQUEST.some(pattern => pattern.test(sentence));
  const requested = directRequest || SENDER_NEED.test(sentence) || IMPERATIVE_VERBS.includes(leadVerb);
  if (!requested) {
    return false;
  }
  if (PAST_ACTION.some(pattern => pattern.test(sentence))) {
    return false;
  }
  // "I sent the draft yesterday." opens with a completed action
  return directRequest || !nlp.leadsWithPastTense(sentence);
}

function extractDeadlines(text: string): string[] {
  const found: Array<{ index: number; value: string }> = [];
  for (const rule of DEADLINE_RULES) {
    for (const match of text.matchAll(rule.pattern)) {
      found.push({ index: match.index ?? 0, value: rule.normalize(match) });
    }
  }

  const deadlines: string[] = [];
  for (const { value } of found.sort((a, b) => a.index - b.index)) {
    if (!deadlines.includes(value)) {
      deadlines.push(value);
    }
  }
  return deadlines.slice(0, MAX_DEADLINES);
}

function extractKeyPhrases(text: string): string[] {
  const quoted = Array.from(text.matchAll(/"([^"]{2,80})"/g), match => match[1]).slice(0, 2);
  const shouted = Array.from(text.matchAll(/\b[A-Z]{4,}\b/g), match => match[0]).slice(0, 2);
  return [...quoted, ...shouted].slice(0, 3);
}

function determineUrgency(text: string, deadlines: readonly string[]): UrgencyLevel {
  if (URGENT_KEYWORDS.test(text)) {
    return 'urgent';
  }
  return deadlines.length > 0 ? 'high' : 'normal';
}

/**
 * Parse an email into structured reply signals. Never throws: a failure
 * inside any step yields an empty context marked as unsuccessful.
 */
export function extractContext(
  email: EmailInput,
  nlp: NlpHandle,
  logger?: ReplyLogger
): ExtractedContext {
  try {
    if (typeof email.body !== 'string' || typeof email.subject !== 'string') {
      throw new ExtractionFailure('Email subject and body must be text');
    }

    const subject = stripSubjectPrefixes(email.subject);
    const coreText = coreBodyLines(email.body).join('\n');
    const sentences = nlp.splitSentences(coreText);

    const questions = sentences.filter(isQuestion).slice(0, MAX_QUESTIONS);
    const actionItems = sentences
      .filter(sentence => isActionItem(sentence, nlp))
      .map(sentence => sentence.slice(0, MAX_ACTION_LENGTH))
      .slice(0, MAX_ACTION_ITEMS);
    const deadlines = extractDeadlines(`${subject}\n${coreText}`);
    const classificationText = `${subject}\n${coreText}`;

    return Object.freeze({
      questions,
      actionItems,
      deadlines,
      mainTopic: findMainTopic(subject, coreText),
      emailCategory: classifyEmail({ text: classificationText, questions, actionItems, nlp }),
      urgencyLevel: determineUrgency(classificationText, deadlines),
      keyPhrases: extractKeyPhrases(coreText),
      senderName: firstName(email.senderName),
      subject,
      hasAttachments: Boolean(email.hasAttachments),
      attachmentCount: email.attachmentCount ?? (email.hasAttachments ? 1 : 0),
      extractedSuccessfully: true
    });
  } catch (error) {
    const failure = error instanceof ExtractionFailure
      ? error
      : new ExtractionFailure(`Context extraction failed: ${errorMessage(error)}`, error);
    logger?.warn(email.senderEmail || 'unknown', 'extraction_failed', failure.message);
    return emptyContext(email);
  }
}
