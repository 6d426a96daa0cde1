/**
 * Backends Command
 *
 * Lists configured backends without touching the network.
 */

import type { BackendDefinition } from '@tunegrab/core';
import { loadCliConfig } from '../config/index.js';
import { printError, printJson, printTable } from '../lib/output.js';

interface BackendsOptions {
  json?: boolean;
}

export function describeBackend(definition: BackendDefinition): Record<string, unknown> {
  const row: Record<string, unknown> = {
    id: definition.id,
    delivery: definition.delivery,
    baseUrl: definition.baseUrl,
    minIntervalMs: definition.rate.minIntervalMs,
    burst: definition.rate.burstAllowance,
  };
  switch (definition.delivery) {
    case 'encrypted-stream':
      row['detail'] = `${definition.stream.keyDerivation}, ${definition.stream.chunkSize}-byte chunks`;
      break;
    case 'peer-transfer':
      row['detail'] = `polls every ${definition.transfer.pollIntervalMs}ms`;
      break;
  }
  return row;
}

export async function backendsCommand(options: BackendsOptions): Promise<void> {
  try {
    const { backends } = await loadCliConfig();
    const rows = backends.map(describeBackend);
    if (options.json) {
      printJson(rows);
    } else {
      printTable(rows);
    }
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  }
}
