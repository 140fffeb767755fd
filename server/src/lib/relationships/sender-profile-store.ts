import path from 'path';
import * as z from 'zod';
import { RelationshipTier, ReplyTone, SenderProfile } from '../../types/reply';
import { CorruptFileError, ProfileStoreUnavailable, errorMessage } from '../../types/errors';
import { KeyedLock } from '../keyed-lock';
import { ReplyLogger } from '../reply-logger';
import { moveAside, readJsonFile, writeJsonAtomic } from '../json-file';

export const OCCASIONAL_THRESHOLD = 5;
export const FREQUENT_THRESHOLD = 20;

const storedProfileSchema = z.object({
  senderEmail: z.string(),
  interactions: z.number().int().min(0),
  preferredTone: z.enum(['formal', 'business', 'casual']).nullable().default(null),
  firstSeen: z.string().nullable().default(null),
  lastInteraction: z.string().nullable().default(null)
});

type StoredProfile = z.infer<typeof storedProfileSchema>;

export interface SenderProfileStoreOptions {
  dataDir: string;
  logger: ReplyLogger;
  lock?: KeyedLock;
}

export function relationshipTier(interactions: number): RelationshipTier {
  if (interactions >= FREQUENT_THRESHOLD) return 'frequent';
  if (interactions >= OCCASIONAL_THRESHOLD) return 'occasional';
  return 'new';
}

export function normalizeSender(sender: string): string {
  return sender.trim().toLowerCase();
}

// The lock may be shared with the learning store, whose keys are unprefixed
function lockKey(key: string): string {
  return `sender:${key}`;
}

function toProfile(stored: StoredProfile, ephemeral = false): SenderProfile {
  return Object.freeze({
    senderEmail: stored.senderEmail,
    interactions: stored.interactions,
    relationship: relationshipTier(stored.interactions),
    preferredTone: stored.preferredTone,
    firstSeen: stored.firstSeen,
    lastInteraction: stored.lastInteraction,
    ephemeral
  });
}

function toStored(profile: SenderProfile): StoredProfile {
  const { senderEmail, interactions, preferredTone, firstSeen, lastInteraction } = profile;
  return { senderEmail, interactions, preferredTone, firstSeen, lastInteraction };
}

function unseen(senderEmail: string): StoredProfile {
  return { senderEmail, interactions: 0, preferredTone: null, firstSeen: null, lastInteraction: null };
}

/**
 * Per-sender interaction history, one JSON file per address.
 *
 * Writes for one sender are serialized; the cache only ever holds profiles
 * that reached disk, so a failed write is retried on the next call.
 */
export class SenderProfileStore {
  readonly directory: string;
  private logger: ReplyLogger;
  private lock: KeyedLock;
  private cache: Map<string, SenderProfile> = new Map();

  constructor(options: SenderProfileStoreOptions) {
    this.directory = path.join(options.dataDir, 'senders');
    this.logger = options.logger;
    this.lock = options.lock || new KeyedLock();
  }

  filePathFor(sender: string): string {
    return path.join(this.directory, `${encodeURIComponent(normalizeSender(sender))}.json`);
  }

  async lookup(sender: string): Promise<SenderProfile> {
    const key = normalizeSender(sender);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }
    try {
      const stored = await this.read(key);
      if (!stored) {
        return toProfile(unseen(key));
      }
      const profile = toProfile(stored);
      this.cache.set(key, profile);
      return profile;
    } catch (error) {
      return this.unavailable(key, 'read', error, unseen(key));
    }
  }

  /**
   * Count one more interaction and remember the tone it was answered in
   */
  async recordInteraction(sender: string, observedTone?: ReplyTone): Promise<SenderProfile> {
    const key = normalizeSender(sender);
    return this.lock.runExclusive(lockKey(key), () => this.mutate(key, (current, now) => ({
      ...current,
      interactions: current.interactions + 1,
      preferredTone: observedTone || current.preferredTone,
      firstSeen: current.firstSeen || now,
      lastInteraction: now
    })));
  }

  async setPreferredTone(sender: string, tone: ReplyTone): Promise<SenderProfile> {
    const key = normalizeSender(sender);
    return this.lock.runExclusive(lockKey(key), () => this.mutate(key, current => ({ ...current, preferredTone: tone })));
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async mutate(
    key: string,
    change: (current: StoredProfile, now: string) => StoredProfile
  ): Promise<SenderProfile> {
    let current: StoredProfile;
    try {
      current = await this.currentStored(key);
    } catch (error) {
      return this.unavailable(key, 'read', error, change(unseen(key), new Date().toISOString()));
    }

    const next = change(current, new Date().toISOString());
    try {
      await writeJsonAtomic(this.filePathFor(key), next);
    } catch (error) {
      return this.unavailable(key, 'write', error, next);
    }

    const profile = toProfile(next);
    this.cache.set(key, profile);
    return profile;
  }

  /**
   * Profile to update. A corrupt file is moved aside and the sender starts
   * over, so one bad file does not leave them ephemeral for good.
   */
  private async currentStored(key: string): Promise<StoredProfile> {
    const cached = this.cache.get(key);
    if (cached) {
      return toStored(cached);
    }
    try {
      return (await this.read(key)) || unseen(key);
    } catch (error) {
      if (!(error instanceof CorruptFileError)) {
        throw error;
      }
      const backup = await moveAside(this.filePathFor(key), `corrupt-${Date.now()}`);
      this.logger.warn(key, 'profile_corrupt', 'Sender profile was unreadable; starting over', {
        backup,
        error: error.message
      });
      return unseen(key);
    }
  }

  private async read(key: string): Promise<StoredProfile | null> {
    const filePath = this.filePathFor(key);
    const raw = await readJsonFile(filePath);
    if (raw === undefined) {
      return null;
    }
    const parsed = storedProfileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CorruptFileError(filePath, parsed.error.issues.map(issue => issue.message).join('; '));
    }
    return parsed.data;
  }

  private unavailable(key: string, operation: 'read' | 'write', error: unknown, fallback: StoredProfile): SenderProfile {
    const failure = new ProfileStoreUnavailable(key, `Sender profile ${operation} failed: ${errorMessage(error)}`, error);
    this.logger.warn(key, 'profile_store_unavailable', failure.message, { operation });
    this.cache.delete(key);
    return toProfile(fallback, true);
  }
}
