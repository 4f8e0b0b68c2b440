/**
 * Seen-Set Store
 *
 * Persists the identities of already-posted articles as a sorted JSON array
 */

import crypto from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { ArticleIdentity, SeenSet } from '../types/index.js';
import { SeenStoreError } from './errors.js';

const seenFileSchema = z.array(z.string());

export interface SeenStore {
  load(): Promise<SeenSet>;
  save(seen: SeenSet): Promise<void>;
}

/**
 * Fingerprint an article URL. The URL is hashed as-is, so trailing-slash or
 * query-string variants produce different identities.
 */
export function articleIdentity(url: string): ArticleIdentity {
  return crypto.createHash('sha1').update(url, 'utf8').digest('hex');
}

/**
 * Serialize identities the way they are stored on disk
 */
export function serializeSeenSet(seen: SeenSet): string {
  return JSON.stringify([...seen].sort());
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function createFileSeenStore(path: string): SeenStore {
  return {
    async load(): Promise<SeenSet> {
      let raw: string;

      try {
        raw = await readFile(path, 'utf-8');
      } catch (error) {
        if (isMissingFile(error)) {
          logger.info({ path }, 'No seen-set file yet, starting empty');
          return new Set();
        }
        throw new SeenStoreError(`Cannot read seen-set file ${path}`, path, { cause: error });
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        throw new SeenStoreError(`Seen-set file ${path} is not valid JSON`, path, { cause: error });
      }

      const result = seenFileSchema.safeParse(parsed);
      if (!result.success) {
        throw new SeenStoreError(`Seen-set file ${path} is not an array of strings`, path, {
          cause: result.error,
        });
      }

      logger.debug({ path, count: result.data.length }, 'Seen-set loaded');
      return new Set(result.data);
    },

    async save(seen: SeenSet): Promise<void> {
      const tempPath = `${path}.tmp`;

      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(tempPath, serializeSeenSet(seen), 'utf-8');
        await rename(tempPath, path);
      } catch (error) {
        await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          logger.debug({ error: cleanupError, tempPath }, 'Could not remove temporary seen-set file');
        });
        throw new SeenStoreError(`Cannot write seen-set file ${path}`, path, { cause: error });
      }

      logger.debug({ path, count: seen.size }, 'Seen-set saved');
    },
  };
}
