/** Username and secret used to authenticate against one endpoint. */
export interface Credential {
  readonly username: string;
  readonly secret: string;
}

/**
 * Error thrown when a credential name is not a safe single path segment.
 */
export class CredentialNameError extends Error {
  public readonly value: string;

  constructor(value: string) {
    super(
      `Invalid credential name ${JSON.stringify(value)}: names must be a single path segment (no '/', '\\', NUL, '.' or '..')`,
    );
    this.name = 'CredentialNameError';
    this.value = value;
  }
}

export function isSafeName(value: string): boolean {
  if (value === '' || value === '.' || value === '..') return false;
  return !/[/\\\0]/.test(value);
}

function checked(name: string): string {
  if (!isSafeName(name)) throw new CredentialNameError(name);
  return name;
}

/** Name of the credential stored for one user on one server: `{server}-{username}`. */
export function serverCredentialName(server: string, username: string): string {
  return checked(`${server}-${username}`);
}

/** Name of the server-independent credential for a user: `{username}`. */
export function userCredentialName(username: string): string {
  return checked(username);
}
