/**
 * CLI Configuration
 *
 * Engine settings come from the environment (a `.env` file is loaded
 * first); backends come from the JSON file it points at.
 */

import {
  loadEngineConfig,
  parseBackendDefinitions,
  ValidationError,
  type BackendDefinition,
  type EngineConfig,
} from '@tunegrab/core';
import { safeReadFile } from '@tunegrab/utils';

export interface CliConfig {
  engine: EngineConfig;
  backends: BackendDefinition[];
}

/**
 * Read and validate a backends file
 */
export async function loadBackendsFile(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<BackendDefinition[]> {
  const content = await safeReadFile(filePath);
  if (content === null) {
    throw new ValidationError('backends', `${filePath} does not exist`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError('backends', `${filePath} is not valid JSON (${reason})`);
  }
  return parseBackendDefinitions(raw, env);
}

export async function loadCliConfig(env: NodeJS.ProcessEnv = process.env): Promise<CliConfig> {
  const engine = loadEngineConfig(env);
  const backends = await loadBackendsFile(engine.backendsFile, env);
  return { engine, backends };
}
