/**
 * GCE Logging Manager Interface
 *
 * Provides abstraction for Cloud Logging operations.
 */

export interface GceLogQueryOptions {
  /** Start time for log query */
  since?: Date;
  /** Maximum number of entries to return */
  lines?: number;
}

export interface IGceLoggingManager {
  /**
   * Startup-script output of an instance, oldest first.
   *
   * @param instanceName - VM instance name
   */
  getStartupLogs(instanceName: string, options?: GceLogQueryOptions): Promise<string[]>;

  /**
   * Get a link to the Cloud Logging console for a specific instance.
   */
  getConsoleLink(instanceName: string): string;
}
