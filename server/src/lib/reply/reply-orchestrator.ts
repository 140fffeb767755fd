import {
  EmailInput,
  ExtractedContext,
  GenerationMethod,
  ReplyMetadata,
  ReplyResult,
  ReplyTone,
  SenderProfile
} from '../../types/reply';
import { GenerationFailure, errorMessage } from '../../types/errors';
import { ReplyEngineConfig } from '../config';
import { extractContext } from '../context/context-extractor';
import { ActiveLearningTracker, EditAnalysis, LearningInsights } from '../learning/active-learning-tracker';
import { LearningStore, emptyLearningData } from '../learning/learning-store';
import { NlpHandle } from '../nlp/nlp-handle';
import { SenderProfileStore } from '../relationships/sender-profile-store';
import { GLOBAL_SCOPE, ReplyLogger } from '../reply-logger';
import { analyzeEdgeCases } from '../safety/edge-case-handler';
import { ReplyNecessityAnalyzer } from '../safety/reply-necessity-analyzer';
import { SensitiveTopicDetector } from '../safety/sensitive-topic-detector';
import { adaptForCategory } from './category-tone-adapter';
import { clampScore, confidenceLevel, scoreConfidence } from './confidence-scorer';
import { buildReply } from './content-reply-builder';
import { injectLearnedPhrases, learnedHints } from './learned-phrase-injector';
import { SIGN_OFFS, composeReply, renderGreeting } from './reply-format';

export const OPTIONAL_ACKNOWLEDGMENT_CONFIDENCE = 0.6;
export const SAFE_MODE_CONFIDENCE = 0.7;

export interface ReplyOrchestratorDeps {
  config: ReplyEngineConfig;
  logger: ReplyLogger;
  nlp: NlpHandle;
  profiles: SenderProfileStore;
  learning: LearningStore;
  tracker: ActiveLearningTracker;
  necessity?: ReplyNecessityAnalyzer;
  sensitive?: SensitiveTopicDetector;
}

function profileSnapshot(profile: SenderProfile): ReplyMetadata['senderProfile'] {
  return Object.freeze({
    interactions: profile.interactions,
    relationship: profile.relationship,
    preferredTone: profile.preferredTone
  });
}

function result(
  replyText: string | null,
  confidenceScore: number,
  generationMethod: GenerationMethod,
  metadata: ReplyMetadata,
  error?: string
): ReplyResult {
  const score = clampScore(confidenceScore);
  return Object.freeze({
    replyText,
    confidenceScore: score,
    confidenceLevel: confidenceLevel(score),
    generationMethod,
    metadata: Object.freeze(metadata),
    ...(error === undefined ? {} : { error })
  });
}

function wrap(tone: ReplyTone, context: ExtractedContext, body: string): string {
  return composeReply({
    greeting: renderGreeting(tone, context.senderName),
    body: [body],
    signOff: SIGN_OFFS[tone]
  });
}

/**
 * Runs one email through extraction, the safety gate, drafting,
 * personalization and scoring. Never throws: failures come back as a
 * 'failed' result.
 */
export class ReplyOrchestrator {
  private config: ReplyEngineConfig;
  private logger: ReplyLogger;
  private nlp: NlpHandle;
  private profiles: SenderProfileStore;
  private learning: LearningStore;
  private tracker: ActiveLearningTracker;
  private necessity: ReplyNecessityAnalyzer;
  private sensitive: SensitiveTopicDetector;

  constructor(deps: ReplyOrchestratorDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.nlp = deps.nlp;
    this.profiles = deps.profiles;
    this.learning = deps.learning;
    this.tracker = deps.tracker;
    this.necessity = deps.necessity || new ReplyNecessityAnalyzer();
    this.sensitive = deps.sensitive || new SensitiveTopicDetector();
  }

  async generateSmartReply(email: EmailInput, detectedTone: ReplyTone): Promise<ReplyResult> {
    const scope = email.senderEmail || GLOBAL_SCOPE;
    let stage = 'extract';

    try {
      const context = extractContext(email, this.nlp, this.logger);

      stage = 'profile';
      const profile = await this.profiles.recordInteraction(email.senderEmail, detectedTone);
      const base: ReplyMetadata = {
        senderProfile: profileSnapshot(profile),
        category: context.emailCategory,
        topic: context.mainTopic,
        urgency: context.urgencyLevel
      };

      stage = 'safety';
      const replyNecessity = this.necessity.analyze(email, context);
      if (!replyNecessity.needsReply) {
        this.logger.info(scope, 'reply_not_needed', replyNecessity.reason, { intent: replyNecessity.emailIntent });
        if (replyNecessity.emailIntent === 'announcement') {
          const topic = context.mainTopic || 'the event';
          const text = wrap(detectedTone, context, `Thanks for the heads up! Looking forward to ${topic}.`);
          return result(text, OPTIONAL_ACKNOWLEDGMENT_CONFIDENCE, 'optional_acknowledgment', { ...base, replyNecessity });
        }
        return result(null, 0, 'no_reply_needed', { ...base, replyNecessity });
      }

      const edgeCase = analyzeEdgeCases(email);
      if (edgeCase.isEdgeCase && !edgeCase.shouldGenerateReply) {
        this.logger.info(scope, 'edge_case', edgeCase.recommendation, { type: edgeCase.edgeCaseType });
        return result(null, 0, 'no_reply', { ...base, replyNecessity, edgeCase });
      }

      const sensitive = this.sensitive.detect(email.subject, email.body);
      if (sensitive.isSensitive && this.config.useSafeModeForSensitive) {
        this.logger.warn(scope, 'sensitive_content', `Using safe mode (risk: ${sensitive.riskLevel})`, {
          categories: sensitive.categories
        });
        const text = wrap(detectedTone, context, this.sensitive.safeModeBody(sensitive, detectedTone));
        return result(text, SAFE_MODE_CONFIDENCE, 'safe_mode', {
          ...base,
          replyNecessity,
          edgeCase,
          sensitive,
          requiresManualReview: sensitive.requiresManualReview
        });
      }

      const learningEnabled = this.config.learningEnabled;
      const minEvidence = this.config.minLearningEvidence;

      stage = 'learning';
      const snapshot = learningEnabled ? await this.learning.ensureLoaded() : emptyLearningData();

      stage = 'build';
      let draft = buildReply(
        context,
        detectedTone,
        profile,
        learningEnabled ? learnedHints(snapshot, minEvidence) : null,
        { priority: this.config.contentPriority }
      );

      if (learningEnabled) {
        stage = 'inject';
        draft = injectLearnedPhrases(draft, context, snapshot, { minEvidence });
      }

      stage = 'adapt';
      const provisional = scoreConfidence(draft.text, context);
      draft.confidence = provisional.score;
      const adapted = adaptForCategory(draft.text, context.emailCategory, draft.confidence, {
        relationship: profile.relationship,
        tone: detectedTone
      });

      stage = 'score';
      const scored = scoreConfidence(adapted.text, context);
      let confidence = clampScore(scored.score + adapted.delta);
      let learningAdjustment: number | undefined;
      if (learningEnabled) {
        learningAdjustment = this.learning.confidenceAdjustment('content_specific', context.emailCategory);
        confidence = clampScore(confidence * learningAdjustment);
      }

      const metadata: ReplyMetadata = {
        ...base,
        ...(adapted.record ? { toneAdapted: Object.freeze(adapted.record) } : {}),
        learningNotes: draft.notes,
        ...(learningAdjustment === undefined ? {} : { learningAdjustment }),
        confidenceSignals: scored.signals,
        confidencePenalties: scored.penalties,
        replyNecessity,
        edgeCase,
        sensitive,
        requiresManualReview: false
      };

      this.logger.info(scope, 'reply_generated', `Generated ${context.emailCategory} reply`, {
        confidence,
        relationship: profile.relationship,
        notes: draft.notes
      });

      return result(adapted.text, confidence, 'content_specific', metadata);
    } catch (error) {
      const failure = new GenerationFailure(stage, `Reply generation failed during ${stage}: ${errorMessage(error)}`, error);
      this.logger.error(scope, 'generation_failed', failure.message, { stage });
      return result(null, 0, 'failed', {}, failure.message);
    }
  }

  /**
   * Feed the text the user actually sent back into the learning store
   */
  async trackReplyEdit(email: EmailInput, reply: ReplyResult, sentText: string): Promise<EditAnalysis | null> {
    if (reply.replyText === null) {
      return null;
    }
    const scope = email.senderEmail || GLOBAL_SCOPE;
    try {
      const context = extractContext(email, this.nlp, this.logger);
      return await this.tracker.recordEdit(reply.replyText, sentText, context, {
        generationMethod: reply.generationMethod,
        senderEmail: email.senderEmail
      });
    } catch (error) {
      this.logger.error(scope, 'edit_tracking_failed', `Could not record edit: ${errorMessage(error)}`);
      return null;
    }
  }

  getLearningInsights(): LearningInsights {
    return this.tracker.getLearningInsights();
  }
}
