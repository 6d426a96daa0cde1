/**
 * File Credential Repository
 *
 * One JSON file per backend under a private directory. Files are written
 * with mode 0600 and validated on load; a corrupt file is treated as absent.
 */

import { join } from 'node:path';
import type { Credential, CredentialRepository } from '@tunegrab/core';
import {
  createLogger,
  removeFile,
  safeReadFile,
  safeWriteFile,
  sanitizeFilename,
} from '@tunegrab/utils';
import { fromStored, storedCredentialSchema, toStored } from './serialization.js';

const logger = createLogger({ component: 'file-credentials' });

export class FileCredentialRepository implements CredentialRepository {
  constructor(private readonly directory: string) {}

  pathFor(backendId: string): string {
    return join(this.directory, `${sanitizeFilename(backendId)}.json`);
  }

  async load(backendId: string): Promise<Credential | null> {
    const content = await safeReadFile(this.pathFor(backendId));
    if (content === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      logger.warn({ backendId, error: error instanceof Error ? error.message : String(error) }, 'Credential file is not valid JSON, ignoring');
      return null;
    }

    const parseResult = storedCredentialSchema.safeParse(raw);
    if (!parseResult.success) {
      logger.warn({ backendId, issues: parseResult.error.issues.length }, 'Credential file failed validation, ignoring');
      return null;
    }

    return fromStored(parseResult.data);
  }

  async save(backendId: string, credential: Credential): Promise<void> {
    const stored = toStored({ ...credential, backendId });
    await safeWriteFile(this.pathFor(backendId), JSON.stringify(stored, null, 2), { mode: 0o600 });
    logger.debug({ backendId }, 'Credential saved');
  }

  async remove(backendId: string): Promise<void> {
    await removeFile(this.pathFor(backendId));
  }
}
