/**
 * Credential Types
 */

export interface Credential {
  backendId: string;
  accessToken: string;
  refreshToken?: string;
  expiresAt?: Date;
  scope: string;
}

/**
 * Persistence collaborator for credentials
 */
export interface CredentialRepository {
  load(backendId: string): Promise<Credential | null>;
  save(backendId: string, credential: Credential): Promise<void>;
  remove(backendId: string): Promise<void>;
}
