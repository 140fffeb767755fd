import { promises as fs } from 'fs';
import path from 'path';
import crypto from 'crypto';
import { CorruptFileError, errorMessage } from '../types/errors';
import { errorCode, withRetry } from './retry-utils';

/**
 * Read and parse a JSON file. Resolves undefined when the file does not
 * exist; unparseable content raises CorruptFileError.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await withRetry(() => fs.readFile(filePath, 'utf8'));
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new CorruptFileError(filePath, `Invalid JSON in ${filePath}: ${errorMessage(error)}`);
  }
}

/**
 * Write through a temp file and rename so readers never observe a
 * half-written document.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);

  try {
    await withRetry(async () => {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmpPath, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
      await fs.rename(tmpPath, filePath);
    });
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

export async function moveAside(filePath: string, suffix: string): Promise<string> {
  const target = `${filePath}.${suffix}`;
  await fs.rename(filePath, target);
  return target;
}
