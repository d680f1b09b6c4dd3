import type { Credential } from './credential.js';

/**
 * Persisted credentials addressed by name.
 *
 * Implementations may be backed by encrypted files, `pass`, memory, etc.
 */
export interface CredentialStore {
  /**
   * Load the credential stored under `name`. Returns `null` if none is stored.
   *
   * @throws CredentialFileError if something is stored but cannot be read.
   */
  load(name: string): Promise<Credential | null>;

  /** Store a credential under `name`, replacing any previous one. */
  save(name: string, credential: Credential): Promise<void>;

  /** Whether this store supports writing. Read-only stores return `false`. */
  supportsWrite(): boolean;

  /** Human-readable location for `name` (file path, pass entry, ...). */
  describe(name: string): string;
}
