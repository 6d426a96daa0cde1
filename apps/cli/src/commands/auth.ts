/**
 * Authentication Commands
 *
 * Seed or inspect the stored credential for a backend.
 */

import ora from 'ora';
import chalk from 'chalk';
import { z } from 'zod';
import { ValidationError, type Credential } from '@tunegrab/core';
import { formatDuration } from '@tunegrab/utils';
import { findBackend, withEngine } from '../lib/engine.js';
import { printError, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

export interface AuthSetOptions {
  accessToken: string;
  refreshToken?: string;
  expiresIn?: string;
  scope: string;
}

const expiresInSchema = z.coerce.number().int().positive();

/**
 * Credential from command-line options; `expiresIn` is in seconds
 */
export function buildCredential(backendId: string, options: AuthSetOptions, now: number = Date.now()): Credential {
  const credential: Credential = {
    backendId,
    accessToken: options.accessToken,
    scope: options.scope,
  };
  if (options.refreshToken) {
    credential.refreshToken = options.refreshToken;
  }
  if (options.expiresIn !== undefined) {
    const parsed = expiresInSchema.safeParse(options.expiresIn);
    if (!parsed.success) {
      throw new ValidationError('expires-in', 'expected a positive number of seconds');
    }
    credential.expiresAt = new Date(now + parsed.data * 1000);
  }
  return credential;
}

export async function authSetCommand(backendId: string, options: AuthSetOptions): Promise<void> {
  try {
    await withEngine(async (engine, config) => {
      findBackend(config, backendId);
      const credential = buildCredential(backendId, options);
      await engine.credentials.store(backendId, credential);

      printSuccess(`Credential stored for ${chalk.bold(backendId)}`);
      if (!credential.expiresAt) {
        printWarning('No expiry given; the token is used until the backend rejects it');
      }
    });
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  }
}

export async function authCheckCommand(backendId: string): Promise<void> {
  const spinner = ora(`Checking credential for ${backendId}...`).start();
  try {
    await withEngine(async (engine, config) => {
      findBackend(config, backendId);
      const credential = await engine.credentials.ensureValid(backendId);
      spinner.succeed('Credential is usable');

      printKeyValue('Scope', credential.scope || '(none)');
      printKeyValue('Refreshable', credential.refreshToken ? 'yes' : 'no');
      printKeyValue(
        'Expires',
        credential.expiresAt
          ? `in ${formatDuration(Math.max(0, credential.expiresAt.getTime() - Date.now()))}`
          : 'never'
      );
    });
  } catch (error) {
    spinner.fail('Credential check failed');
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  }
}
