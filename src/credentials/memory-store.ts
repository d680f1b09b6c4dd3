import type { Credential } from './credential.js';
import type { CredentialStore } from './credential-store.js';

/**
 * In-memory credential store.
 *
 * Used for injected secrets (e.g. from a CI environment) and in tests.
 */
export class MemoryCredentialStore implements CredentialStore {
  private readonly entries = new Map<string, Credential>();
  private readonly writable: boolean;

  constructor(initial: Record<string, Credential> = {}, options: { writable?: boolean } = {}) {
    for (const [name, credential] of Object.entries(initial)) {
      this.entries.set(name, credential);
    }
    this.writable = options.writable ?? true;
  }

  async load(name: string): Promise<Credential | null> {
    return this.entries.get(name) ?? null;
  }

  async save(name: string, credential: Credential): Promise<void> {
    if (!this.writable) {
      throw new Error('Read-only credential store');
    }
    this.entries.set(name, credential);
  }

  supportsWrite(): boolean {
    return this.writable;
  }

  describe(name: string): string {
    return `memory:${name}`;
  }
}
