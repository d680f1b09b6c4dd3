import { SessionValueMissingError } from '../errors.js';

/** Target namespaces used by the built-in clients. */
export type Namespace = 'vcenter' | 'nsx' | 'vcloud' | 'credentials' | (string & {});

function isProvided<T>(value: T | null | undefined): value is T {
  return value !== undefined && value !== null && value !== '';
}

/**
 * Values resolved during one command invocation (server names, tokens,
 * credentials), keyed by namespace and name.
 *
 * Callers create one context per invocation and pass it down explicitly.
 * Writes are last-write-wins; nothing expires.
 */
export class SessionContext {
  private readonly entries = new Map<string, unknown>();

  scope(namespace: Namespace): SessionScope {
    return new SessionScope(this.entries, namespace);
  }

  /** Current entries as `{ "<namespace>:<name>": value }`. */
  snapshot(): Record<string, unknown> {
    return Object.fromEntries(this.entries);
  }
}

export class SessionScope {
  private readonly entries: Map<string, unknown>;
  readonly namespace: string;

  constructor(entries: Map<string, unknown>, namespace: string) {
    this.entries = entries;
    this.namespace = namespace;
  }

  private key(name: string): string {
    return `${this.namespace}:${name}`;
  }

  get<T>(name: string): T | undefined {
    // Values are only written through `set`/`sync` with the caller's type.
    return this.entries.get(this.key(name)) as T | undefined;
  }

  has(name: string): boolean {
    return this.entries.has(this.key(name));
  }

  set<T>(name: string, value: T): T {
    this.entries.set(this.key(name), value);
    return value;
  }

  delete(name: string): boolean {
    return this.entries.delete(this.key(name));
  }

  /**
   * Store and return `provided` when it is non-empty; otherwise return the
   * cached value.
   *
   * @throws SessionValueMissingError when `mandatory` and nothing is cached.
   */
  sync<T>(name: string, provided: T | null | undefined, mandatory: true): T;
  sync<T>(name: string, provided: T | null | undefined, mandatory?: boolean): T | undefined;
  sync<T>(name: string, provided: T | null | undefined, mandatory = false): T | undefined {
    if (isProvided(provided)) {
      return this.set(name, provided);
    }
    if (this.has(name)) {
      return this.get<T>(name);
    }
    if (mandatory) {
      throw new SessionValueMissingError(this.key(name));
    }
    return undefined;
  }
}
