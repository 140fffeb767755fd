import { ReplyTone } from '../../types/reply';

const GREETING_WORD: Record<ReplyTone, string> = {
  formal: 'Dear',
  business: 'Hello',
  casual: 'Hi'
};

const ANONYMOUS_GREETING: Record<ReplyTone, string> = {
  formal: 'Dear Sir or Madam,',
  business: 'Hello,',
  casual: 'Hi there,'
};

export const SIGN_OFFS: Record<ReplyTone, string> = {
  formal: 'Kind regards',
  business: 'Best regards',
  casual: 'Cheers'
};

const GREETING_PATTERN = /^(Dear|Hello|Hi)\b\s*(.*?),$/;

export interface ReplyParts {
  greeting: string | null;
  body: string[];
  signOff: string | null;
}

export function renderGreeting(tone: ReplyTone, name: string): string {
  return name ? `${GREETING_WORD[tone]} ${name},` : ANONYMOUS_GREETING[tone];
}

/**
 * Register of a greeting line, or null when the line is not one we wrote
 */
export function greetingRegister(line: string): { tone: ReplyTone; name: string } | null {
  const match = GREETING_PATTERN.exec(line.trim());
  if (!match) {
    return null;
  }
  const tone: ReplyTone = match[1] === 'Dear' ? 'formal' : match[1] === 'Hello' ? 'business' : 'casual';
  const name = match[2] === 'Sir or Madam' || match[2] === 'there' ? '' : match[2];
  return { tone, name };
}

export function signOffTone(line: string): ReplyTone | null {
  const trimmed = line.trim();
  const entry = Object.entries(SIGN_OFFS).find(([, signOff]) => signOff === trimmed);
  if (!entry) {
    return null;
  }
  const tone = entry[0];
  return tone === 'formal' || tone === 'business' || tone === 'casual' ? tone : null;
}

export function composeReply(parts: ReplyParts): string {
  const blocks = [parts.greeting, ...parts.body, parts.signOff];
  return blocks.filter((block): block is string => Boolean(block && block.trim())).join('\n\n');
}

export function splitReply(text: string): ReplyParts {
  const blocks = text.split(/\n{2,}/).map(block => block.trim()).filter(Boolean);
  const greeting = blocks.length > 0 && greetingRegister(blocks[0]) ? blocks.shift() ?? null : null;
  const last = blocks[blocks.length - 1];
  const signOff = last !== undefined && signOffTone(last) ? blocks.pop() ?? null : null;
  return { greeting, body: blocks, signOff };
}

export function splitSentences(paragraph: string): string[] {
  return paragraph.split(/(?<=[.!?])\s+/).map(sentence => sentence.trim()).filter(Boolean);
}

export function capitalizeFirst(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
