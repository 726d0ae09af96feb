import type {
  Credential,
  CredentialPatch,
  DailyUsage,
  NewCredentialInput,
} from './credential.js';

export class CredentialNotFoundError extends Error {
  constructor(public readonly credentialId: string) {
    super(`Credential ${credentialId} not found`);
    this.name = 'CredentialNotFoundError';
  }
}

export class InvalidCredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCredentialError';
  }
}

/**
 * Durable keyed storage for credentials and their counters.
 *
 * Counter updates must be atomic per credential, and every read or write of
 * the daily counter rolls it over first when its date is no longer today.
 */
export interface CredentialStore {
  /** Active credentials, least-used (lifetime successes) first */
  listActiveCredentials(): Promise<Credential[]>;
  /** Today's success count for a credential; 0 for unknown ids */
  dailyUsage(id: string): Promise<DailyUsage>;
  incrementSuccess(id: string): Promise<void>;
  incrementFailure(id: string): Promise<void>;
  get(id: string): Promise<Credential | null>;

  // Administrative surface
  list(): Promise<Credential[]>;
  add(input: NewCredentialInput): Promise<Credential>;
  update(id: string, patch: CredentialPatch): Promise<Credential>;
  remove(id: string): Promise<boolean>;
}
