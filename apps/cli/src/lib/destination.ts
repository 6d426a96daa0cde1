/**
 * Output path resolution
 */

import { join, resolve } from 'node:path';
import { parsePeerTrackRef } from '@tunegrab/acquisition';
import type { BackendDefinition } from '@tunegrab/core';
import { getExtension, remoteBasename, sanitizeFilename } from '@tunegrab/utils';

export function defaultFileName(delivery: BackendDefinition['delivery'], trackRef: string): string {
  if (delivery === 'peer-transfer') {
    return sanitizeFilename(remoteBasename(parsePeerTrackRef(trackRef).remoteFileRef));
  }
  return sanitizeFilename(trackRef);
}

/**
 * An output with an extension names the file; anything else is a directory.
 */
export function resolveDestination(
  delivery: BackendDefinition['delivery'],
  trackRef: string,
  output: string | undefined,
  cwd: string = process.cwd()
): string {
  const fileName = defaultFileName(delivery, trackRef);
  if (!output) {
    return join(cwd, fileName);
  }
  if (getExtension(output) !== '') {
    return resolve(cwd, output);
  }
  return join(resolve(cwd, output), fileName);
}
