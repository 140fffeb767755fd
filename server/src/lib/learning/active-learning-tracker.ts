import crypto from 'crypto';
import winkSentiment from 'wink-sentiment';
import { ExtractedContext, GenerationMethod } from '../../types/reply';
import { errorMessage } from '../../types/errors';
import { GLOBAL_SCOPE, ReplyLogger } from '../reply-logger';
import {
  CONCRETE_TIMELINE,
  VAGUE_TIMELINE_GLOBAL,
  hasEnthusiasm,
  normalizePhrase
} from '../reply/phrases';
import { diffPhrases } from './phrase-diff';
import { EditRecord, EditType, LearningStore, ToneShift } from './learning-store';

export interface EditMeta {
  generationMethod?: GenerationMethod;
  senderEmail?: string;
}

export interface EditAnalysis {
  id: string;
  editType: EditType;
  similarity: number;
  toneShift: ToneShift;
  addedPhrases: string[];
  removedPhrases: string[];
  timelinePreferences: string[];
  enthusiasm: 'added' | 'removed' | null;
  lengthChange: number;
}

export interface MethodPerformance {
  total: number;
  accepted: number;
  acceptanceRate: number;
}

export interface LearningInsights {
  totalEdits: number;
  acceptanceRate: number;
  averageSimilarity: number;
  editTypeDistribution: Record<string, number>;
  methodPerformance: Record<string, MethodPerformance>;
  learningConfidence: number;
  preferredReplyLength: number;
  preferredTimeline: string | null;
  topAddedPhrases: Array<{ text: string; frequency: number }>;
  topAvoidedPhrases: Array<{ text: string; frequency: number }>;
}

export interface ActiveLearningTrackerOptions {
  enabled: boolean;
  sentimentPolarity?: (text: string) => number;
}

const TONE_SHIFT_THRESHOLD = 0.2;
const EDITS_FOR_FULL_CONFIDENCE = 50;

export function classifyEdit(similarity: number): EditType {
  if (similarity >= 0.95) return 'minor_tweak';
  if (similarity >= 0.7) return 'moderate_change';
  if (similarity >= 0.4) return 'major_rewrite';
  return 'complete_rejection';
}

/**
 * wink-sentiment scores run roughly -5..5; scale into -1..1
 */
export function sentimentPolarity(text: string): number {
  const { normalizedScore } = winkSentiment(text);
  return Math.max(-1, Math.min(1, normalizedScore / 5));
}

function rate(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 1000) / 1000;
}

function topPhrases(phrases: Record<string, { text: string; frequency: number }>, limit = 5) {
  return Object.values(phrases)
    .sort((a, b) => b.frequency - a.frequency || a.text.localeCompare(b.text))
    .slice(0, limit)
    .map(({ text, frequency }) => ({ text, frequency }));
}

/**
 * Learns from (generated, sent) reply pairs. The only writer of the
 * learning store; runs independently of generation.
 */
export class ActiveLearningTracker {
  private enabled: boolean;
  private polarity: (text: string) => number;

  constructor(
    private store: LearningStore,
    private logger: ReplyLogger,
    options: ActiveLearningTrackerOptions
  ) {
    this.enabled = options.enabled;
    this.polarity = options.sentimentPolarity || sentimentPolarity;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  async recordEdit(
    generatedText: string,
    sentText: string,
    context: ExtractedContext,
    meta: EditMeta = {}
  ): Promise<EditAnalysis | null> {
    if (!this.enabled) {
      return null;
    }

    const scope = meta.senderEmail || GLOBAL_SCOPE;
    const at = new Date().toISOString();
    await this.store.ensureLoaded();

    const diff = diffPhrases(generatedText, sentText);
    const addedPhrases = uniqueByKey(diff.addedPhrases);
    const removedPhrases = uniqueByKey(diff.removedPhrases);

    for (const phrase of addedPhrases) {
      await this.store.creditPhrase('added', phrase, at);
    }
    for (const phrase of removedPhrases) {
      await this.store.creditPhrase('avoided', phrase, at);
    }

    // A vague timeline the user swapped for a concrete one
    const timelinePreferences: string[] = [];
    for (const hunk of diff.hunks) {
      const deletedText = hunk.deleted.join(' ');
      const insertedText = hunk.inserted.join(' ');
      const vague = Array.from(deletedText.matchAll(VAGUE_TIMELINE_GLOBAL), match => match[0].toLowerCase());
      const concrete = CONCRETE_TIMELINE.exec(insertedText);
      if (vague.length > 0 && concrete) {
        const preferred = concrete[0].trim();
        await this.store.creditTimeline(preferred, vague, at);
        timelinePreferences.push(preferred);
      }
    }

    let enthusiasm: EditAnalysis['enthusiasm'] = null;
    const generatedEnthusiastic = hasEnthusiasm(generatedText);
    const sentEnthusiastic = hasEnthusiasm(sentText);
    if (!generatedEnthusiastic && sentEnthusiastic) {
      enthusiasm = 'added';
    } else if (generatedEnthusiastic && !sentEnthusiastic) {
      enthusiasm = 'removed';
    }
    if (enthusiasm) {
      await this.store.creditEnthusiasm(context.emailCategory, enthusiasm);
    }

    const record: EditRecord = {
      id: crypto.randomUUID(),
      timestamp: at,
      editType: classifyEdit(diff.similarity),
      similarity: diff.similarity,
      toneShift: this.toneShift(generatedText, sentText),
      generationMethod: meta.generationMethod || 'content_specific',
      category: context.emailCategory,
      addedPhrases,
      removedPhrases,
      lengthChange: sentText.length - generatedText.length
    };
    await this.store.recordEditOutcome({ record, replyLength: sentText.length });
    await this.store.flush();

    this.logger.info(scope, 'edit_recorded', `Recorded ${record.editType} edit`, {
      similarity: record.similarity,
      added: addedPhrases.length,
      removed: removedPhrases.length,
      timelines: timelinePreferences
    });

    return {
      id: record.id,
      editType: record.editType,
      similarity: record.similarity,
      toneShift: record.toneShift,
      addedPhrases,
      removedPhrases,
      timelinePreferences,
      enthusiasm,
      lengthChange: record.lengthChange
    };
  }

  getLearningInsights(): LearningInsights {
    const snapshot = this.store.snapshot();
    const stats = snapshot.editStats;
    const accepted = (stats.byType.minor_tweak || 0) + (stats.byType.moderate_change || 0);

    const methodPerformance: Record<string, MethodPerformance> = {};
    for (const [method, { total, accepted: methodAccepted }] of Object.entries(stats.byMethod)) {
      methodPerformance[method] = { total, accepted: methodAccepted, acceptanceRate: rate(methodAccepted, total) };
    }

    const timelines = Object.values(snapshot.timelinePreferences)
      .sort((a, b) => b.frequency - a.frequency || a.text.localeCompare(b.text));

    return {
      totalEdits: stats.totalEdits,
      acceptanceRate: rate(accepted, stats.totalEdits),
      averageSimilarity: rate(stats.similaritySum, stats.totalEdits),
      editTypeDistribution: { ...stats.byType },
      methodPerformance,
      learningConfidence: Math.min(1, stats.totalEdits / EDITS_FOR_FULL_CONFIDENCE),
      preferredReplyLength: snapshot.preferredReplyLength,
      preferredTimeline: timelines.length > 0 ? timelines[0].text : null,
      topAddedPhrases: topPhrases(snapshot.addedPhrases),
      topAvoidedPhrases: topPhrases(snapshot.avoidedPhrases)
    };
  }

  private toneShift(generatedText: string, sentText: string): ToneShift {
    try {
      const delta = this.polarity(sentText) - this.polarity(generatedText);
      if (delta > TONE_SHIFT_THRESHOLD) return 'more_positive';
      if (delta < -TONE_SHIFT_THRESHOLD) return 'more_negative';
      return 'similar';
    } catch (error) {
      this.logger.debug(GLOBAL_SCOPE, 'tone_shift_failed', errorMessage(error));
      return 'similar';
    }
  }
}

function uniqueByKey(phrases: string[]): string[] {
  const seen = new Set<string>();
  return phrases.filter(phrase => {
    const key = normalizePhrase(phrase);
    if (!key || seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
