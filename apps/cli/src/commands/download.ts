/**
 * Download Command
 *
 * Submits one acquisition job and follows it to a terminal state.
 */

import ora from 'ora';
import { FileSink, type JobStateEvent } from '@tunegrab/acquisition';
import { JobState } from '@tunegrab/core';
import { findBackend, withEngine } from '../lib/engine.js';
import { resolveDestination } from '../lib/destination.js';
import { printError, printHeader, printJobStatus, printJson, printKeyValue } from '../lib/output.js';

interface DownloadOptions {
  backend: string;
  output?: string;
  json?: boolean;
}

export async function downloadCommand(trackRef: string, options: DownloadOptions): Promise<void> {
  try {
    await withEngine(async (engine, config) => {
      const definition = findBackend(config, options.backend);
      const destination = resolveDestination(definition.delivery, trackRef, options.output);
      const { orchestrator } = engine;

      if (!options.json) {
        printHeader('Acquiring Track');
        printKeyValue('Backend', definition.id);
        printKeyValue('Track', trackRef);
        printKeyValue('Destination', destination);
        console.log();
      }

      const spinner = ora({ text: 'Queued', isSilent: options.json === true }).start();
      const jobId = orchestrator.submit(definition.id, trackRef, new FileSink(destination));

      const onState = (event: JobStateEvent): void => {
        if (event.jobId === jobId) {
          spinner.text = event.reason ? `${event.to} (${event.reason})` : event.to;
        }
      };
      const onInterrupt = (): void => {
        spinner.text = 'Cancelling';
        orchestrator.cancel(jobId);
      };
      orchestrator.on('job:state', onState);
      process.once('SIGINT', onInterrupt);

      try {
        const status = await orchestrator.waitFor(jobId);
        if (status.state === JobState.COMPLETED) {
          spinner.succeed(`Saved to ${destination}`);
        } else {
          spinner.fail(status.lastError ? `Failed: ${status.lastError.reason}` : 'Failed');
          process.exitCode = 1;
        }

        if (options.json) {
          printJson({ ...status, destination });
        } else {
          console.log();
          printJobStatus(status);
        }
      } finally {
        process.off('SIGINT', onInterrupt);
        orchestrator.off('job:state', onState);
      }
    });
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  }
}
