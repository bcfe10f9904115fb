/**
 * GCE IAM Manager Interface
 *
 * Project-level IAM checks and bindings.
 */

export interface IGceIamManager {
  /**
   * Check which of the given permissions the caller lacks on the project.
   *
   * @returns The missing permissions, empty when all are granted
   */
  testPermissions(permissions: readonly string[]): Promise<string[]>;

  /**
   * Add a member to a role on the project policy.
   *
   * @param member - e.g. "user:alice@example.com" or "serviceAccount:..."
   * @returns false when the binding was already present
   */
  addProjectBinding(member: string, role: string): Promise<boolean>;
}
