import dotenv from 'dotenv';
import { EmailInput, ReplyResult, ReplyTone } from './types/reply';
import { ReplyEngineConfig, resolveConfig } from './lib/config';
import { AdmissionGate } from './lib/admission-gate';
import { KeyedLock } from './lib/keyed-lock';
import { GLOBAL_SCOPE, ReplyLogger } from './lib/reply-logger';
import { NlpHandle, createNlpHandle } from './lib/nlp/nlp-handle';
import { SenderProfileStore } from './lib/relationships/sender-profile-store';
import { LearningStore } from './lib/learning/learning-store';
import { ActiveLearningTracker, EditAnalysis } from './lib/learning/active-learning-tracker';
import { ReplyOrchestrator } from './lib/reply/reply-orchestrator';

// Load environment variables
dotenv.config();

export interface ReplyEngine {
  config: ReplyEngineConfig;
  logger: ReplyLogger;
  nlp: NlpHandle;
  profiles: SenderProfileStore;
  learning: LearningStore;
  tracker: ActiveLearningTracker;
  orchestrator: ReplyOrchestrator;
  gate: AdmissionGate;
  generate(email: EmailInput, tone: ReplyTone): Promise<ReplyResult>;
  recordEdit(email: EmailInput, reply: ReplyResult, sentText: string): Promise<EditAnalysis | null>;
}

export interface CreateReplyEngineOptions {
  config?: Partial<ReplyEngineConfig>;
  env?: NodeJS.ProcessEnv;
  logger?: ReplyLogger;
}

/**
 * Build the shared engine once: NLP handle, stores, tracker and the
 * admission gate every generation passes through.
 */
export async function createReplyEngine(options: CreateReplyEngineOptions = {}): Promise<ReplyEngine> {
  const config = resolveConfig(options.config, options.env);
  const logger = options.logger || new ReplyLogger({ logLevel: config.logLevel });
  const nlp = createNlpHandle();
  const lock = new KeyedLock();

  const profiles = new SenderProfileStore({ dataDir: config.learningDataDir, logger, lock });
  const learning = new LearningStore({ dataDir: config.learningDataDir, logger, lock });
  if (config.learningEnabled) {
    await learning.ensureLoaded();
  }

  const tracker = new ActiveLearningTracker(learning, logger, { enabled: config.learningEnabled });
  const orchestrator = new ReplyOrchestrator({ config, logger, nlp, profiles, learning, tracker });
  const gate = new AdmissionGate(config.maxConcurrentGenerations);

  logger.info(GLOBAL_SCOPE, 'engine_ready', 'Reply engine ready', {
    learningEnabled: config.learningEnabled,
    maxConcurrentGenerations: config.maxConcurrentGenerations
  });

  return {
    config,
    logger,
    nlp,
    profiles,
    learning,
    tracker,
    orchestrator,
    gate,
    generate: (email, tone) => gate.run(() => orchestrator.generateSmartReply(email, tone)),
    recordEdit: (email, reply, sentText) => orchestrator.trackReplyEdit(email, reply, sentText)
  };
}

export { loadConfig, resolveConfig, validateConfig } from './lib/config';
export type { ReplyEngineConfig } from './lib/config';
export { ReplyLogger } from './lib/reply-logger';
export { extractContext } from './lib/context/context-extractor';
export { buildReply } from './lib/reply/content-reply-builder';
export { injectLearnedPhrases } from './lib/reply/learned-phrase-injector';
export { adaptForCategory } from './lib/reply/category-tone-adapter';
export { scoreConfidence, confidenceLevel } from './lib/reply/confidence-scorer';
export { ReplyOrchestrator } from './lib/reply/reply-orchestrator';
export * from './types/reply';
export * from './types/errors';
