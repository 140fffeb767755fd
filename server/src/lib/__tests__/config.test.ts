import { loadConfig, resolveConfig, validateConfig } from '../config';
import { ConfigValidationError } from '../../types/errors';

describe('Engine configuration', () => {
  it('should fall back to defaults for unset variables', () => {
    expect(loadConfig({})).toEqual({
      learningEnabled: true,
      learningDataDir: './ai_data',
      minLearningEvidence: 3,
      maxConcurrentGenerations: 4,
      contentPriority: ['deadline', 'action_item', 'question', 'topic'],
      useSafeModeForSensitive: true,
      logLevel: 'info'
    });
  });

  it('should read flags, numbers and the priority list from the environment', () => {
    const config = loadConfig({
      LEARNING_ENABLED: 'no',
      LEARNING_MIN_EVIDENCE: '5',
      REPLY_CONTENT_PRIORITY: 'question, deadline',
      LOG_LEVEL: 'warn'
    });

    expect(config.learningEnabled).toBe(false);
    expect(config.minLearningEvidence).toBe(5);
    expect(config.contentPriority).toEqual(['question', 'deadline']);
    expect(config.logLevel).toBe('warn');
  });

  it('should reject a minimum evidence below one', () => {
    expect(() => loadConfig({ LEARNING_MIN_EVIDENCE: '0' })).toThrow(ConfigValidationError);
  });

  it('should list every invalid key', () => {
    try {
      validateConfig({ ...loadConfig({}), contentPriority: ['topic', 'topic'], maxConcurrentGenerations: 0 });
      throw new Error('expected validation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues.some(issue => issue.startsWith('contentPriority'))).toBe(true);
        expect(error.issues.some(issue => issue.startsWith('maxConcurrentGenerations'))).toBe(true);
      }
    }
  });

  it('should reject unknown flag values', () => {
    expect(() => loadConfig({ LEARNING_ENABLED: 'maybe' })).toThrow(/LEARNING_ENABLED/);
  });

  it('should apply overrides on top of the environment', () => {
    const config = resolveConfig({ learningDataDir: '/tmp/replies' }, { MAX_CONCURRENT_GENERATIONS: '2' });

    expect(config.learningDataDir).toBe('/tmp/replies');
    expect(config.maxConcurrentGenerations).toBe(2);
  });
});
