/**
 * GCE Service Manager Interface
 *
 * Enables Google Cloud APIs on the project through Service Usage.
 */

export interface IGceServiceManager {
  /**
   * Enable the given APIs (e.g. "compute.googleapis.com") in one batch and
   * wait for the long-running operation. Already-enabled APIs are a no-op.
   *
   * @returns The APIs that had to be enabled
   */
  enableServices(services: readonly string[]): Promise<string[]>;

  /** Names of the APIs currently enabled on the project. */
  listEnabled(): Promise<string[]>;
}
