import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { EmailInput } from '../../types/reply';
import { ReplyLogger } from '../reply-logger';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'smart-reply-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function quietLogger(): ReplyLogger {
  return new ReplyLogger({ echo: false, logLevel: 'debug' });
}

export function makeEmail(overrides: Partial<EmailInput> = {}): EmailInput {
  return {
    subject: 'Q4 Report - When ready?',
    body: "when can you send me the Q4 report? I need it for tomorrow's meeting.",
    senderEmail: 'sarah@example.com',
    senderName: 'Sarah Chen',
    ...overrides
  };
}
