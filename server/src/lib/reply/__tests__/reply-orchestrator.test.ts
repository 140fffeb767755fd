import { ReplyEngine, createReplyEngine } from '../../../index';
import { SenderProfile } from '../../../types/reply';
import { resolveConfig } from '../../config';
import { ActiveLearningTracker } from '../../learning/active-learning-tracker';
import { LearningStore } from '../../learning/learning-store';
import { createNlpHandle } from '../../nlp/nlp-handle';
import { SenderProfileStore } from '../../relationships/sender-profile-store';
import { ReplyOrchestrator } from '../reply-orchestrator';
import { makeEmail, makeTempDir, quietLogger, removeTempDir } from '../../__tests__/test-utils';
import sensitiveTopics from '../../../data/sensitive-topics.json';

const Q4_REPLY =
  "Hello Sarah,\n\nThank you for reaching out. I'll send you the Q4 report by tomorrow.\n\nBest regards";

class OfflineProfileStore extends SenderProfileStore {
  async recordInteraction(): Promise<SenderProfile> {
    throw new Error('profile store offline');
  }
}

describe('Reply orchestration', () => {
  let dataDir: string;
  let engine: ReplyEngine;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    engine = await createReplyEngine({ config: { learningDataDir: dataDir }, env: {}, logger: quietLogger() });
  });

  afterEach(async () => {
    await removeTempDir(dataDir);
  });

  it('should answer a request with its content and deadline', async () => {
    const result = await engine.generate(makeEmail(), 'business');

    expect(result.replyText).toBe(Q4_REPLY);
    expect(result.confidenceScore).toBe(0.85);
    expect(result.confidenceLevel).toBe('high');
    expect(result.generationMethod).toBe('content_specific');
    expect(result.metadata.senderProfile).toEqual({ interactions: 1, relationship: 'new', preferredTone: 'business' });
    expect(result.metadata.learningAdjustment).toBe(1);
    expect(result.metadata.requiresManualReview).toBe(false);
    expect(result.error).toBeUndefined();

    const stored = await new SenderProfileStore({ dataDir, logger: quietLogger() }).lookup('sarah@example.com');
    expect(stored).toMatchObject({ interactions: 1, ephemeral: false });
  });

  it('should warm up the reply for a frequent sender', async () => {
    for (let i = 0; i < 20; i++) {
      await engine.profiles.recordInteraction('sarah@example.com', 'business');
    }

    const result = await engine.generate(makeEmail(), 'business');

    expect(result.replyText).toBe(
      "Hi Sarah,\n\nGreat to hear from you! I'll send you the Q4 report by tomorrow.\n\nCheers"
    );
    expect(result.confidenceScore).toBe(0.9);
    expect(result.metadata.toneAdapted).toMatchObject({ original: 'business', adapted: 'casual' });
  });

  it('should fall back to an acknowledgment for a vague email', async () => {
    const result = await engine.generate(
      makeEmail({ subject: 'Question', body: 'Just checking in on things.' }),
      'business'
    );

    expect(result.replyText).toBe('Hello Sarah,\n\nThanks for checking in.\n\nBest regards');
    expect(result.confidenceScore).toBe(0.45);
    expect(result.confidenceLevel).toBe('low');
  });

  it('should not draft replies to automated senders', async () => {
    const result = await engine.generate(makeEmail({ senderEmail: 'noreply@service.example.com' }), 'business');

    expect(result.replyText).toBeNull();
    expect(result.generationMethod).toBe('no_reply_needed');
    expect(result.metadata.replyNecessity?.emailIntent).toBe('automated');
  });

  it('should offer a short optional acknowledgment for announcements', async () => {
    const result = await engine.generate(
      makeEmail({ subject: 'Save the date: Design summit', body: 'The summit is on March 3 in the main hall.' }),
      'business'
    );

    expect(result.generationMethod).toBe('optional_acknowledgment');
    expect(result.confidenceScore).toBe(0.6);
    expect(result.replyText?.startsWith('Hello Sarah,\n\nThanks for the heads up! Looking forward to ')).toBe(true);
  });

  it('should hold sensitive emails in safe mode', async () => {
    const result = await engine.generate(
      makeEmail({
        subject: 'Contract dispute',
        body: 'Our attorney says we may need to consider legal action over the late delivery.'
      }),
      'business'
    );

    expect(result.generationMethod).toBe('safe_mode');
    expect(result.confidenceScore).toBe(0.7);
    expect(result.replyText).toBe(`Hello Sarah,\n\n${sensitiveTopics.templates.legal.business}\n\nBest regards`);
    expect(result.metadata.requiresManualReview).toBe(true);
  });

  it('should skip emails too short to answer', async () => {
    const result = await engine.generate(makeEmail({ subject: 'Re: notes', body: 'ok' }), 'business');

    expect(result.generationMethod).toBe('no_reply');
    expect(result.replyText).toBeNull();
    expect(result.metadata.edgeCase?.edgeCaseType).toBe('very_short');
  });

  it('should learn from an edited reply', async () => {
    const email = makeEmail();
    const reply = await engine.generate(email, 'business');

    const analysis = await engine.recordEdit(email, reply, Q4_REPLY.replace('by tomorrow.', 'by tomorrow morning.'));

    expect(analysis?.editType).toBe('minor_tweak');
    expect(analysis?.similarity).toBe(0.9714);
    expect(engine.orchestrator.getLearningInsights().totalEdits).toBe(1);
  });

  it('should not track edits of replies that were never drafted', async () => {
    const email = makeEmail({ senderEmail: 'noreply@service.example.com' });
    const reply = await engine.generate(email, 'business');

    await expect(engine.recordEdit(email, reply, 'Thanks!')).resolves.toBeNull();
  });

  it('should run without learning when it is disabled', async () => {
    const plain = await createReplyEngine({
      config: { learningDataDir: dataDir, learningEnabled: false },
      env: {},
      logger: quietLogger()
    });
    const email = makeEmail();

    const reply = await plain.generate(email, 'business');

    expect(reply.replyText).toBe(Q4_REPLY);
    expect(reply.metadata.learningAdjustment).toBeUndefined();
    await expect(plain.recordEdit(email, reply, 'Sure, will do.')).resolves.toBeNull();
  });

  it('should report a failed stage instead of throwing', async () => {
    const logger = quietLogger();
    const config = resolveConfig({ learningDataDir: dataDir }, {});
    const learning = new LearningStore({ dataDir, logger });
    const orchestrator = new ReplyOrchestrator({
      config,
      logger,
      nlp: createNlpHandle(),
      profiles: new OfflineProfileStore({ dataDir, logger }),
      learning,
      tracker: new ActiveLearningTracker(learning, logger, { enabled: true })
    });

    const result = await orchestrator.generateSmartReply(makeEmail(), 'business');

    expect(result.generationMethod).toBe('failed');
    expect(result.replyText).toBeNull();
    expect(result.confidenceScore).toBe(0);
    expect(result.error).toBe('Reply generation failed during profile: profile store offline');
    expect(logger.getLogs('sarah@example.com').map(entry => entry.event)).toContain('generation_failed');
  });
});
