import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { InvalidJobIdError } from '../utils/errors';

export function isValidJobId(jobId: string): boolean {
  return (
    jobId.length > 0 &&
    jobId !== '.' &&
    jobId !== '..' &&
    !jobId.includes('/') &&
    !jobId.includes('\\') &&
    basename(jobId) === jobId
  );
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * One markdown file per listing id. A file's existence is the cache hit;
 * entries are never refreshed, overwritten or removed.
 */
export class DetailCache {
  constructor(readonly dir: string) {}

  pathFor(jobId: string): string {
    if (!isValidJobId(jobId)) {
      throw new InvalidJobIdError(jobId);
    }
    return join(this.dir, `${jobId}.md`);
  }

  has(jobId: string): boolean {
    return existsSync(this.pathFor(jobId));
  }

  async read(jobId: string): Promise<string | undefined> {
    try {
      return await readFile(this.pathFor(jobId), 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return undefined;
      throw error;
    }
  }

  /**
   * Writes the body verbatim. Returns false when an entry already existed.
   */
  async store(jobId: string, body: string): Promise<boolean> {
    const path = this.pathFor(jobId);
    await mkdir(this.dir, { recursive: true });
    try {
      await writeFile(path, body, { encoding: 'utf-8', flag: 'wx' });
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) return false;
      throw error;
    }
  }
}
