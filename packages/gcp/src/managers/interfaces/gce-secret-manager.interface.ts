/**
 * GCE Secret Manager Interface
 *
 * Provides abstraction for secret storage operations.
 */

export interface IGceSecretManager {
  /** IDs of every secret in the project, following pagination. */
  listSecretIds(): Promise<string[]>;

  /**
   * Ensure a secret exists with the given value.
   * Creates the secret if it doesn't exist, or adds a new version if it does.
   */
  ensureSecret(name: string, value: string): Promise<void>;

  /**
   * Create a secret holding the placeholder value. Never touches an
   * existing secret.
   *
   * @returns True when the secret was created
   */
  ensurePlaceholder(name: string): Promise<boolean>;

  /**
   * Read the latest version of a secret.
   *
   * @returns Secret value, or undefined if the secret or its versions are missing
   */
  accessLatest(name: string): Promise<string | undefined>;

  /** Check if a secret exists. */
  secretExists(name: string): Promise<boolean>;

  /** Delete a secret. Missing secrets are ignored. */
  deleteSecret(name: string): Promise<void>;
}
