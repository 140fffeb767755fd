import * as z from 'zod';
import { ContentKind, DEFAULT_CONTENT_PRIORITY } from '../types/reply';
import { ConfigValidationError } from '../types/errors';
import type { LogLevel } from './reply-logger';

export interface ReplyEngineConfig {
  learningEnabled: boolean;
  learningDataDir: string;
  minLearningEvidence: number;
  maxConcurrentGenerations: number;
  contentPriority: ContentKind[];
  useSafeModeForSensitive: boolean;
  logLevel: LogLevel;
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const contentKind = z.enum(['deadline', 'action_item', 'question', 'topic']);

const configSchema = z.object({
  learningEnabled: z.boolean(),
  learningDataDir: z.string().min(1, 'learningDataDir must not be empty'),
  minLearningEvidence: z.number().int().min(1),
  maxConcurrentGenerations: z.number().int().min(1),
  contentPriority: z
    .array(contentKind)
    .min(1)
    .refine(kinds => new Set(kinds).size === kinds.length, 'contentPriority must not repeat a kind'),
  useSafeModeForSensitive: z.boolean(),
  logLevel: z.enum(LOG_LEVELS)
});

const envSchema = z.object({
  LEARNING_ENABLED: flag.default('true'),
  LEARNING_DATA_DIR: z.string().default('./ai_data'),
  LEARNING_MIN_EVIDENCE: z.coerce.number().default(3),
  MAX_CONCURRENT_GENERATIONS: z.coerce.number().default(4),
  REPLY_CONTENT_PRIORITY: z.string().default(DEFAULT_CONTENT_PRIORITY.join(',')),
  SAFE_MODE_FOR_SENSITIVE: flag.default('true'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
}

function parsePriority(value: string): string[] {
  return value
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

/**
 * Reads engine settings from environment variables. Unset variables fall
 * back to defaults; invalid ones raise ConfigValidationError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReplyEngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigValidationError(formatIssues(parsed.error));
  }

  return validateConfig({
    learningEnabled: parsed.data.LEARNING_ENABLED,
    learningDataDir: parsed.data.LEARNING_DATA_DIR,
    minLearningEvidence: parsed.data.LEARNING_MIN_EVIDENCE,
    maxConcurrentGenerations: parsed.data.MAX_CONCURRENT_GENERATIONS,
    contentPriority: parsePriority(parsed.data.REPLY_CONTENT_PRIORITY),
    useSafeModeForSensitive: parsed.data.SAFE_MODE_FOR_SENSITIVE,
    logLevel: parsed.data.LOG_LEVEL
  });
}

export function validateConfig(candidate: unknown): ReplyEngineConfig {
  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigValidationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Environment settings with explicit overrides applied on top.
 */
export function resolveConfig(
  overrides: Partial<ReplyEngineConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ReplyEngineConfig {
  return validateConfig({ ...loadConfig(env), ...overrides });
}
