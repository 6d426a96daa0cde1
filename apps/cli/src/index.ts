#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Runs acquisition jobs in-process against the configured backends.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';

import { downloadCommand } from './commands/download.js';
import { authCheckCommand, authSetCommand } from './commands/auth.js';
import { backendsCommand } from './commands/backends.js';

const program = new Command();

program
  .name('tunegrab')
  .description('Acquire tracks from streaming and peer-to-peer backends')
  .version('0.1.0');

// ============================================
// ACQUISITION
// ============================================

program
  .command('download <trackRef>')
  .description('Acquire a track (peer tracks are "<username>::<remote path>")')
  .requiredOption('-b, --backend <id>', 'Backend to acquire from')
  .option('-o, --output <path>', 'Output file, or a directory for the default name')
  .option('--json', 'Print the final job status as JSON')
  .action(downloadCommand);

program
  .command('backends')
  .description('List configured backends')
  .option('--json', 'Output in JSON format')
  .action(backendsCommand);

// ============================================
// CREDENTIALS
// ============================================

const auth = program
  .command('auth')
  .description('Manage backend credentials');

auth
  .command('set <backendId>')
  .description('Store a credential obtained out of band')
  .requiredOption('--access-token <token>', 'Access token')
  .option('--refresh-token <token>', 'Refresh token')
  .option('--expires-in <seconds>', 'Token lifetime in seconds')
  .option('--scope <scope>', 'Granted scope', '')
  .action(authSetCommand);

auth
  .command('check <backendId>')
  .description('Load, refresh or obtain a usable credential')
  .action(authCheckCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('tunegrab --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
