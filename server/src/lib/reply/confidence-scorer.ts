import { ConfidenceLevel, ExtractedContext } from '../../types/reply';
import {
  hasCommittedAction,
  hasConcreteTimeline,
  hasEnthusiasm,
  hasGenericFiller,
  hasVagueTimeline
} from './phrases';

export const BASE_CONFIDENCE = 0.5;
export const MEDIUM_THRESHOLD = 0.5;
export const HIGH_THRESHOLD = 0.75;

export type QualitySignal = 'concrete_timeline' | 'committed_action' | 'enthusiasm' | 'topic_reference';
export type PenaltySignal = 'generic_filler' | 'vague_timeline';

const SIGNAL_WEIGHTS: Record<QualitySignal, number> = {
  concrete_timeline: 0.1,
  committed_action: 0.1,
  enthusiasm: 0.05,
  topic_reference: 0.1
};

const PENALTY_WEIGHTS: Record<PenaltySignal, number> = {
  generic_filler: 0.15,
  vague_timeline: 0.1
};

export interface ConfidenceScore {
  score: number;
  level: ConfidenceLevel;
  signals: QualitySignal[];
  penalties: PenaltySignal[];
}

export function clampScore(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.round(Math.min(1, Math.max(0, value)) * 100) / 100;
}

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score > HIGH_THRESHOLD) {
    return 'high';
  }
  return score >= MEDIUM_THRESHOLD ? 'medium' : 'low';
}

function referencesTopic(text: string, topic: string): boolean {
  return topic.length > 0 && text.toLowerCase().includes(topic.toLowerCase());
}

/**
 * Deterministic quality estimate for a reply. Each signal counts at most
 * once; the result is clamped to [0, 1] and rounded to two decimals.
 */
export function scoreConfidence(text: string, context: Pick<ExtractedContext, 'mainTopic'>): ConfidenceScore {
  const signals: QualitySignal[] = [];
  const penalties: PenaltySignal[] = [];

  if (hasConcreteTimeline(text)) signals.push('concrete_timeline');
  if (hasCommittedAction(text)) signals.push('committed_action');
  if (hasEnthusiasm(text)) signals.push('enthusiasm');
  if (referencesTopic(text, context.mainTopic)) signals.push('topic_reference');

  if (hasGenericFiller(text)) penalties.push('generic_filler');
  if (hasVagueTimeline(text)) penalties.push('vague_timeline');

  const raw = BASE_CONFIDENCE +
    signals.reduce((sum, signal) => sum + SIGNAL_WEIGHTS[signal], 0) -
    penalties.reduce((sum, penalty) => sum + PENALTY_WEIGHTS[penalty], 0);

  const score = clampScore(raw);
  return { score, level: confidenceLevel(score), signals, penalties };
}
