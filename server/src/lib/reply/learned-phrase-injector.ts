import { ExtractedContext, ReplyDraft } from '../../types/reply';
import { LearningSnapshot, PhraseStat, TimelineStat } from '../learning/learning-store';
import { ReplyHints } from './content-reply-builder';
import {
  COMMITTED_ACTION,
  VAGUE_TIMELINE_GLOBAL,
  containsPhrase,
  hasEnthusiasm,
  hasGenericFiller,
  hasVagueTimeline,
  normalizePhrase
} from './phrases';
import { capitalizeFirst, composeReply, splitReply, splitSentences } from './reply-format';

export interface InjectionOptions {
  minEvidence: number;
}

const ENTHUSIASM_OPENER = 'Great question!';
const MIN_PHRASE_WORDS = 3;

function byFrequency<T extends { text: string; frequency: number }>(a: T, b: T): number {
  return b.frequency - a.frequency || a.text.localeCompare(b.text);
}

export function preferredTimeline(snapshot: LearningSnapshot, minEvidence: number): TimelineStat | null {
  const candidates = Object.values(snapshot.timelinePreferences)
    .filter(stat => stat.frequency >= minEvidence)
    .sort(byFrequency);
  return candidates[0] || null;
}

/**
 * The most frequent phrase users keep adding, when it is specific enough to
 * append on its own. Chosen without looking at the draft so that repeated
 * injection settles on the same phrase.
 */
export function commonlyAddedPhrase(snapshot: LearningSnapshot, minEvidence: number): PhraseStat | null {
  const candidates = Object.values(snapshot.addedPhrases)
    .filter(stat => stat.frequency >= minEvidence)
    .filter(stat => stat.text.split(/\s+/).length >= MIN_PHRASE_WORDS)
    .filter(stat => !hasVagueTimeline(stat.text) && !hasGenericFiller(stat.text))
    .sort(byFrequency);
  return candidates[0] || null;
}

/**
 * Builder hints from the learning store: phrases the user keeps deleting and
 * the timeline they keep choosing.
 */
export function learnedHints(snapshot: LearningSnapshot, minEvidence: number): ReplyHints {
  const timeline = preferredTimeline(snapshot, minEvidence);
  return {
    avoidedPhrases: Object.values(snapshot.avoidedPhrases)
      .filter(stat => stat.frequency >= minEvidence)
      .map(stat => stat.text),
    preferredTimeline: timeline ? timeline.text : null
  };
}

function enthusiasmEarned(context: ExtractedContext, snapshot: LearningSnapshot, minEvidence: number): boolean {
  const stats = snapshot.enthusiasm[context.emailCategory];
  if (!stats || stats.added - stats.removed < minEvidence) {
    return false;
  }
  const avoided = snapshot.avoidedPhrases[normalizePhrase(ENTHUSIASM_OPENER)];
  return !avoided || avoided.frequency < minEvidence;
}

function exclaimFirstCommitment(paragraph: string): string | null {
  const sentences = splitSentences(paragraph);
  const index = sentences.findIndex(sentence => COMMITTED_ACTION.test(sentence) && sentence.endsWith('.'));
  if (index === -1) {
    return null;
  }
  sentences[index] = `${sentences[index].slice(0, -1)}!`;
  return sentences.join(' ');
}

/**
 * Apply what the learning store has seen often enough: enthusiasm the user
 * adds for this category, their preferred concrete timeline, and a phrase
 * they habitually add. Only adds or replaces wording, and running it on its
 * own output changes nothing.
 */
export function injectLearnedPhrases(
  draft: ReplyDraft,
  context: ExtractedContext,
  snapshot: LearningSnapshot,
  options: InjectionOptions
): ReplyDraft {
  const { minEvidence } = options;
  const parts = splitReply(draft.text);
  const body = [...parts.body];
  const notes = [...draft.notes];

  if (body.length === 0) {
    return { ...draft, notes };
  }

  if (!hasEnthusiasm(draft.text) && enthusiasmEarned(context, snapshot, minEvidence)) {
    if (context.questions.length > 0) {
      body[0] = `${ENTHUSIASM_OPENER} ${body[0]}`;
      notes.push('learned:enthusiasm');
    } else {
      const index = body.findIndex(paragraph => exclaimFirstCommitment(paragraph) !== null);
      const exclaimed = index === -1 ? null : exclaimFirstCommitment(body[index]);
      if (exclaimed !== null) {
        body[index] = exclaimed;
        notes.push('learned:enthusiasm');
      }
    }
  }

  const timeline = preferredTimeline(snapshot, minEvidence);
  if (timeline && body.some(paragraph => hasVagueTimeline(paragraph))) {
    for (let i = 0; i < body.length; i++) {
      body[i] = body[i].replace(VAGUE_TIMELINE_GLOBAL, timeline.text);
    }
    notes.push('learned:timeline');
  }

  const phrase = commonlyAddedPhrase(snapshot, minEvidence);
  if (phrase && !containsPhrase(body.join(' '), phrase.text)) {
    const last = body.length - 1;
    body[last] = `${body[last]} ${capitalizeFirst(phrase.text)}.`;
    notes.push('learned:phrase');
  }

  return {
    text: composeReply({ greeting: parts.greeting, body, signOff: parts.signOff }),
    confidence: draft.confidence,
    notes
  };
}
