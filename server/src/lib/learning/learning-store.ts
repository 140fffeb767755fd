import path from 'path';
import * as z from 'zod';
import { CorruptFileError, LearningStoreCorrupt, errorMessage } from '../../types/errors';
import { KeyedLock } from '../keyed-lock';
import { GLOBAL_SCOPE, ReplyLogger } from '../reply-logger';
import { moveAside, readJsonFile, writeJsonAtomic } from '../json-file';
import { normalizePhrase } from '../reply/phrases';

export const EDIT_TYPES = ['minor_tweak', 'moderate_change', 'major_rewrite', 'complete_rejection'] as const;
export const TONE_SHIFTS = ['more_positive', 'more_negative', 'similar'] as const;

export type EditType = typeof EDIT_TYPES[number];
export type ToneShift = typeof TONE_SHIFTS[number];

export const MIN_ADJUSTMENT = 0.5;
export const MAX_ADJUSTMENT = 1.2;

const count = z.number().int().min(0);

const phraseStatSchema = z.object({
  text: z.string(),
  frequency: count,
  lastSeen: z.string()
});

const timelineStatSchema = phraseStatSchema.extend({
  replaced: z.record(count).default({})
});

const enthusiasmStatSchema = z.object({
  added: count.default(0),
  removed: count.default(0)
});

const adjustment = z.number().min(MIN_ADJUSTMENT).max(MAX_ADJUSTMENT);

const editRecordSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  editType: z.enum(EDIT_TYPES),
  similarity: z.number().min(0).max(1),
  toneShift: z.enum(TONE_SHIFTS),
  generationMethod: z.string(),
  category: z.string(),
  addedPhrases: z.array(z.string()),
  removedPhrases: z.array(z.string()),
  lengthChange: z.number().int()
});

export const learningStoreSchema = z.object({
  version: z.literal(1).default(1),
  addedPhrases: z.record(phraseStatSchema).default({}),
  avoidedPhrases: z.record(phraseStatSchema).default({}),
  timelinePreferences: z.record(timelineStatSchema).default({}),
  enthusiasm: z.record(enthusiasmStatSchema).default({}),
  confidenceAdjustments: z.object({
    byMethod: z.record(adjustment).default({}),
    byCategory: z.record(adjustment).default({})
  }).default({}),
  editStats: z.object({
    totalEdits: count.default(0),
    similaritySum: z.number().min(0).default(0),
    byType: z.record(count).default({}),
    byMethod: z.record(z.object({ total: count, accepted: count })).default({})
  }).default({}),
  preferredReplyLength: count.default(0),
  recentEdits: z.array(editRecordSchema).default([]),
  updatedAt: z.string().nullable().default(null)
});

export type LearningStoreData = z.infer<typeof learningStoreSchema>;
export type LearningSnapshot = Readonly<LearningStoreData>;
export type PhraseStat = z.infer<typeof phraseStatSchema>;
export type TimelineStat = z.infer<typeof timelineStatSchema>;
export type EditRecord = z.infer<typeof editRecordSchema>;
export type PhraseKind = 'added' | 'avoided';

export interface EditOutcome {
  record: EditRecord;
  replyLength: number;
}

export interface LearningStoreOptions {
  dataDir: string;
  logger: ReplyLogger;
  lock?: KeyedLock;
  recentEditLimit?: number;
  fileName?: string;
}

export function emptyLearningData(): LearningSnapshot {
  return Object.freeze(learningStoreSchema.parse({}));
}

function round(value: number, places = 4): number {
  const factor = Math.pow(10, places);
  return Math.round(value * factor) / factor;
}

function isAccepted(editType: EditType): boolean {
  return editType === 'minor_tweak' || editType === 'moderate_change';
}

function adjust(current: number | undefined, editType: EditType): number {
  const base = current ?? 1;
  if (isAccepted(editType)) {
    return round(Math.min(MAX_ADJUSTMENT, base * 1.02));
  }
  if (editType === 'complete_rejection') {
    return round(Math.max(MIN_ADJUSTMENT, base * 0.95));
  }
  return base;
}

function sumCounts(base: Record<string, number>, extra: Record<string, number>): Record<string, number> {
  const merged = { ...base };
  for (const [key, value] of Object.entries(extra)) {
    merged[key] = (merged[key] || 0) + value;
  }
  return merged;
}

function mergePhrases<T extends PhraseStat>(
  base: Record<string, T>,
  extra: Record<string, T>,
  combine: (existing: T, added: T) => T
): Record<string, T> {
  const merged = { ...base };
  for (const [key, stat] of Object.entries(extra)) {
    const existing = merged[key];
    merged[key] = existing ? combine(existing, stat) : stat;
  }
  return merged;
}

function mergeAdjustments(base: Record<string, number>, extra: Record<string, number>): Record<string, number> {
  const merged = { ...base };
  for (const [key, value] of Object.entries(extra)) {
    merged[key] = round(Math.min(MAX_ADJUSTMENT, Math.max(MIN_ADJUSTMENT, (merged[key] ?? 1) * value)));
  }
  return merged;
}

/**
 * Fold updates recorded in memory while the file was unreadable into what
 * the file holds. Counts add up and adjustment factors multiply.
 */
export function mergeLearningData(
  disk: LearningSnapshot,
  memory: LearningSnapshot,
  recentEditLimit: number
): LearningStoreData {
  const addPhrase = (existing: PhraseStat, added: PhraseStat): PhraseStat => ({
    text: existing.text,
    frequency: existing.frequency + added.frequency,
    lastSeen: added.lastSeen
  });

  const enthusiasm = { ...disk.enthusiasm };
  for (const [category, stats] of Object.entries(memory.enthusiasm)) {
    const existing = enthusiasm[category] || { added: 0, removed: 0 };
    enthusiasm[category] = { added: existing.added + stats.added, removed: existing.removed + stats.removed };
  }

  const byMethod = { ...disk.editStats.byMethod };
  for (const [method, stats] of Object.entries(memory.editStats.byMethod)) {
    const existing = byMethod[method] || { total: 0, accepted: 0 };
    byMethod[method] = { total: existing.total + stats.total, accepted: existing.accepted + stats.accepted };
  }

  return {
    ...disk,
    addedPhrases: mergePhrases(disk.addedPhrases, memory.addedPhrases, addPhrase),
    avoidedPhrases: mergePhrases(disk.avoidedPhrases, memory.avoidedPhrases, addPhrase),
    timelinePreferences: mergePhrases(disk.timelinePreferences, memory.timelinePreferences, (existing, added) => ({
      ...addPhrase(existing, added),
      replaced: sumCounts(existing.replaced, added.replaced)
    })),
    enthusiasm,
    confidenceAdjustments: {
      byMethod: mergeAdjustments(disk.confidenceAdjustments.byMethod, memory.confidenceAdjustments.byMethod),
      byCategory: mergeAdjustments(disk.confidenceAdjustments.byCategory, memory.confidenceAdjustments.byCategory)
    },
    editStats: {
      totalEdits: disk.editStats.totalEdits + memory.editStats.totalEdits,
      similaritySum: round(disk.editStats.similaritySum + memory.editStats.similaritySum),
      byType: sumCounts(disk.editStats.byType, memory.editStats.byType),
      byMethod
    },
    preferredReplyLength: memory.preferredReplyLength || disk.preferredReplyLength,
    recentEdits: [...disk.recentEdits, ...memory.recentEdits].slice(-recentEditLimit),
    updatedAt: memory.updatedAt
  };
}

/**
 * Phrase statistics learned from user edits, persisted as one JSON document.
 *
 * Readers get an immutable snapshot. Writers replace it copy-on-write under a
 * per-key lock (one key per phrase), so updates to unrelated phrases never
 * wait on each other. Disk writes are coalesced into a single serialized chain.
 */
export class LearningStore {
  readonly filePath: string;
  private logger: ReplyLogger;
  private lock: KeyedLock;
  private recentEditLimit: number;
  private current: LearningSnapshot = emptyLearningData();
  private loaded = false;
  private loading: Promise<LearningSnapshot> | null = null;
  private dirty = false;
  private pendingFlush: Promise<void> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: LearningStoreOptions) {
    this.filePath = path.join(options.dataDir, options.fileName || 'learning-store.json');
    this.logger = options.logger;
    this.lock = options.lock || new KeyedLock();
    this.recentEditLimit = options.recentEditLimit || 50;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  snapshot(): LearningSnapshot {
    return this.current;
  }

  /**
   * Load from disk unless an earlier load already succeeded. Failed loads
   * are retried on the next call; updates made in the meantime are kept and
   * merged into whatever the file holds once it can be read.
   */
  async ensureLoaded(): Promise<LearningSnapshot> {
    if (this.loaded) {
      return this.current;
    }
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async load(): Promise<LearningSnapshot> {
    try {
      const raw = await readJsonFile(this.filePath);
      let fromDisk = emptyLearningData();
      if (raw !== undefined) {
        const parsed = learningStoreSchema.safeParse(raw);
        if (!parsed.success) {
          throw new LearningStoreCorrupt(
            this.filePath,
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
          );
        }
        fromDisk = Object.freeze(parsed.data);
      }
      this.current = this.dirty
        ? Object.freeze(mergeLearningData(fromDisk, this.current, this.recentEditLimit))
        : fromDisk;
      this.loaded = true;
    } catch (error) {
      if (error instanceof LearningStoreCorrupt || error instanceof CorruptFileError) {
        await this.recoverFromCorruption(error);
      } else {
        this.logger.warn(GLOBAL_SCOPE, 'learning_store_unavailable', `Learning store could not be read: ${errorMessage(error)}`, {
          file: this.filePath
        });
      }
    }
    return this.current;
  }

  private async recoverFromCorruption(error: Error): Promise<void> {
    try {
      const backup = await moveAside(this.filePath, `corrupt-${Date.now()}`);
      this.loaded = true;
      this.logger.warn(GLOBAL_SCOPE, 'learning_store_corrupt', 'Learning store was unreadable; starting empty', {
        file: this.filePath,
        backup,
        error: error.message
      });
    } catch (moveError) {
      this.logger.warn(GLOBAL_SCOPE, 'learning_store_corrupt', `Learning store is unreadable and could not be moved aside: ${errorMessage(moveError)}`, {
        file: this.filePath,
        error: error.message
      });
    }
  }

  /**
   * Adjustment multiplier for a generation method and email category,
   * bounded to [0.5, 1.2].
   */
  confidenceAdjustment(method: string, category: string): number {
    const { byMethod, byCategory } = this.current.confidenceAdjustments;
    const value = (byMethod[method] ?? 1) * (byCategory[category] ?? 1);
    return round(Math.min(MAX_ADJUSTMENT, Math.max(MIN_ADJUSTMENT, value)), 4);
  }

  async creditPhrase(kind: PhraseKind, text: string, at: string): Promise<number> {
    const key = normalizePhrase(text);
    if (!key) {
      return 0;
    }

    const next = await this.update(`${kind}:${key}`, current => {
      const phrases = kind === 'added' ? current.addedPhrases : current.avoidedPhrases;
      const existing = phrases[key];
      const stat: PhraseStat = {
        text: existing ? existing.text : text,
        frequency: (existing ? existing.frequency : 0) + 1,
        lastSeen: at
      };
      return kind === 'added'
        ? { ...current, addedPhrases: { ...current.addedPhrases, [key]: stat } }
        : { ...current, avoidedPhrases: { ...current.avoidedPhrases, [key]: stat } };
    });

    const field = kind === 'added' ? next.addedPhrases : next.avoidedPhrases;
    return field[key]?.frequency ?? 0;
  }

  async creditTimeline(text: string, replacedVague: readonly string[], at: string): Promise<number> {
    const key = normalizePhrase(text);
    if (!key) {
      return 0;
    }

    const next = await this.update(`timeline:${key}`, current => {
      const existing = current.timelinePreferences[key];
      const replaced = { ...(existing ? existing.replaced : {}) };
      for (const vague of replacedVague) {
        const vagueKey = normalizePhrase(vague);
        replaced[vagueKey] = (replaced[vagueKey] || 0) + 1;
      }
      const stat: TimelineStat = {
        text: existing ? existing.text : text,
        frequency: (existing ? existing.frequency : 0) + 1,
        lastSeen: at,
        replaced
      };
      return { ...current, timelinePreferences: { ...current.timelinePreferences, [key]: stat } };
    });

    return next.timelinePreferences[key]?.frequency ?? 0;
  }

  async creditEnthusiasm(category: string, direction: 'added' | 'removed'): Promise<void> {
    await this.update(`enthusiasm:${category}`, current => {
      const existing = current.enthusiasm[category] || { added: 0, removed: 0 };
      const updated = direction === 'added'
        ? { added: existing.added + 1, removed: existing.removed }
        : { added: existing.added, removed: existing.removed + 1 };
      return { ...current, enthusiasm: { ...current.enthusiasm, [category]: updated } };
    });
  }

  async recordEditOutcome(outcome: EditOutcome): Promise<void> {
    const { record, replyLength } = outcome;

    await this.update('stats', current => {
      const stats = current.editStats;
      const methodStats = stats.byMethod[record.generationMethod] || { total: 0, accepted: 0 };
      const adjustments = current.confidenceAdjustments;

      return {
        ...current,
        editStats: {
          totalEdits: stats.totalEdits + 1,
          similaritySum: round(stats.similaritySum + record.similarity),
          byType: { ...stats.byType, [record.editType]: (stats.byType[record.editType] || 0) + 1 },
          byMethod: {
            ...stats.byMethod,
            [record.generationMethod]: {
              total: methodStats.total + 1,
              accepted: methodStats.accepted + (isAccepted(record.editType) ? 1 : 0)
            }
          }
        },
        confidenceAdjustments: {
          byMethod: {
            ...adjustments.byMethod,
            [record.generationMethod]: adjust(adjustments.byMethod[record.generationMethod], record.editType)
          },
          byCategory: {
            ...adjustments.byCategory,
            [record.category]: adjust(adjustments.byCategory[record.category], record.editType)
          }
        },
        // Moving average of what the user actually sends
        preferredReplyLength: current.preferredReplyLength === 0
          ? replyLength
          : Math.round(current.preferredReplyLength * 0.9 + replyLength * 0.1),
        recentEdits: [...current.recentEdits, record].slice(-this.recentEditLimit)
      };
    });
  }

  /**
   * Persist the latest snapshot. Concurrent callers share one pending write;
   * failures are logged and retried on the next flush.
   */
  flush(): Promise<void> {
    if (!this.pendingFlush) {
      const flush = this.writeChain.then(() => {
        this.pendingFlush = null;
        return this.persist();
      });
      this.pendingFlush = flush;
      this.writeChain = flush;
    }
    return this.pendingFlush;
  }

  private async update(
    key: string,
    mutate: (current: LearningSnapshot) => LearningStoreData
  ): Promise<LearningSnapshot> {
    return this.lock.runExclusive(key, async () => {
      await this.ensureLoaded();
      const next = Object.freeze({ ...mutate(this.current), updatedAt: new Date().toISOString() });
      this.current = next;
      this.dirty = true;
      return next;
    });
  }

  private async persist(): Promise<void> {
    // Never overwrite a file we could not read
    if (!this.dirty || !this.loaded) {
      return;
    }

    const snapshot = this.current;
    this.dirty = false;
    try {
      await writeJsonAtomic(this.filePath, snapshot);
    } catch (error) {
      this.dirty = true;
      this.logger.warn(GLOBAL_SCOPE, 'learning_store_write_failed', `Learning store write failed: ${errorMessage(error)}`, {
        file: this.filePath
      });
    }
  }
}
