export type { Credential } from './credential.js';
export { CredentialNameError, serverCredentialName, userCredentialName } from './credential.js';
export type { CredentialStore } from './credential-store.js';
export type { CredentialConfig, FileBackendConfig, PassBackendConfig } from './credential-config.js';
export {
  parseCredentialConfigValue,
  createCredentialStore,
  defaultCredentialConfig,
} from './credential-config.js';
export { FileCredentialStore } from './file-store.js';
export { PassCredentialStore } from './pass.js';
export { MemoryCredentialStore } from './memory-store.js';
export { type Prompter, InquirerPrompter } from './prompt.js';
export {
  type CredentialRequest,
  type ResolverDeps,
  type ResolvedCredential,
  type CredentialSource,
  resolveCredential,
  decodePassword,
} from './resolver.js';
export {
  DEFAULT_KEY_ENV,
  encodeSecret,
  decodeSecret,
  isEncodedSecret,
  parseSecretKey,
  secretKeyFromEnv,
  envSecretKey,
  toSecretKeyProvider,
} from './secret-codec.js';
export type { SecretKeyProvider } from './secret-codec.js';
