/**
 * Per-invocation dependencies of the app commands.
 *
 * The CLI builds one `AppEnv` from the loaded config and global options;
 * tests build one around in-memory stores and a manual clock.
 */

import type { Config } from '../config.js';
import { type Clock, SystemClock } from '../clock.js';
import { createCredentialStore } from '../credentials/credential-config.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { InquirerPrompter, type Prompter } from '../credentials/prompt.js';
import { envSecretKey, type SecretKeyProvider } from '../credentials/secret-codec.js';
import { SessionContext } from '../session/context.js';
import type { TransportOptions } from '../targets/target.js';

export interface AppEnv {
  config: Config;
  context: SessionContext;
  store: CredentialStore;
  /** Key for encoded passwords given on the command line, parsed on first use. */
  secretKey: SecretKeyProvider;
  interactive: boolean;
  prompter?: Prompter;
  transport: TransportOptions;
  clock: Clock;
}

/** Global CLI options that override config values. */
export interface GlobalOptions {
  skipCertificateCheck?: boolean;
  timeoutMs?: number;
  interactive?: boolean;
}

export interface EnvOverrides {
  store?: CredentialStore;
  prompter?: Prompter;
  clock?: Clock;
  context?: SessionContext;
}

export function createAppEnv(config: Config, options: GlobalOptions = {}, overrides: EnvOverrides = {}): AppEnv {
  const interactive = options.interactive ?? (process.stdin.isTTY === true);
  return {
    config,
    context: overrides.context ?? new SessionContext(),
    store: overrides.store ?? createCredentialStore(config.credentials),
    secretKey: envSecretKey(config.credentials.key_env),
    interactive,
    prompter: overrides.prompter ?? (interactive ? new InquirerPrompter() : undefined),
    transport: {
      skipCertificateCheck: options.skipCertificateCheck || config.http.skip_certificate_check,
      timeoutMs: options.timeoutMs ?? config.http.timeout,
    },
    clock: overrides.clock ?? new SystemClock(),
  };
}
