/**
 * Engine lifecycle for one CLI invocation
 */

import { createEngine, type Engine } from '@tunegrab/acquisition';
import { NotFoundError, type BackendDefinition } from '@tunegrab/core';
import { loadCliConfig, type CliConfig } from '../config/index.js';

export function findBackend(config: CliConfig, backendId: string): BackendDefinition {
  const definition = config.backends.find((backend) => backend.id === backendId);
  if (!definition) {
    throw new NotFoundError('Backend', backendId);
  }
  return definition;
}

/**
 * Build the engine, run `fn` against it and always close it afterwards
 */
export async function withEngine<T>(fn: (engine: Engine, config: CliConfig) => Promise<T>): Promise<T> {
  const config = await loadCliConfig();
  const engine = createEngine({ config: config.engine, backends: config.backends });
  try {
    return await fn(engine, config);
  } finally {
    await engine.close();
  }
}
