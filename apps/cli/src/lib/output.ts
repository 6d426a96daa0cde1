/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { JobStatus } from '@tunegrab/core';
import { formatDuration } from '@tunegrab/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printTable(data: Record<string, unknown>[]): void {
  if (data.length === 0) {
    console.log(chalk.blue('i'), 'No data to display');
    return;
  }
  console.table(data);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  const rounded = unit === 0 ? String(value) : value.toFixed(1);
  return `${rounded} ${BYTE_UNITS[unit]}`;
}

export function printJobStatus(status: JobStatus): void {
  printKeyValue('Job ID', status.jobId);
  printKeyValue('Backend', status.backendId);
  printKeyValue('Track', status.trackRef);
  printKeyValue('State', status.state);
  printKeyValue('Attempts', status.attempt);
  printKeyValue('Written', formatBytes(status.bytesWritten));
  printKeyValue('Elapsed', formatDuration(status.updatedAt.getTime() - status.createdAt.getTime()));
  if (status.lastError) {
    printKeyValue('Error', `${status.lastError.reason}: ${status.lastError.message}`);
  }
}
