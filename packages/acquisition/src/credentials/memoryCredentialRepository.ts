/**
 * In-memory credential repository for one-off runs and tests
 */

import type { Credential, CredentialRepository } from '@tunegrab/core';

export class InMemoryCredentialRepository implements CredentialRepository {
  private readonly credentials = new Map<string, Credential>();

  constructor(initial: Credential[] = []) {
    for (const credential of initial) {
      this.credentials.set(credential.backendId, { ...credential });
    }
  }

  async load(backendId: string): Promise<Credential | null> {
    const credential = this.credentials.get(backendId);
    return credential ? { ...credential } : null;
  }

  async save(backendId: string, credential: Credential): Promise<void> {
    this.credentials.set(backendId, { ...credential, backendId });
  }

  async remove(backendId: string): Promise<void> {
    this.credentials.delete(backendId);
  }
}
