/**
 * GCE Compute Manager Interface
 *
 * Lifecycle of the single VM instance.
 */

import type { InstanceInfo, InstanceSpec, VmStatus } from "../../types";

export interface IGceComputeManager {
  /** Get an instance, or undefined when it does not exist. */
  getInstance(name: string): Promise<InstanceInfo | undefined>;
  /** Create an instance without an external IP and wait for the operation. */
  createInstance(spec: InstanceSpec): Promise<void>;
  /** Get VM instance status ("UNKNOWN" when missing). */
  getInstanceStatus(name: string): Promise<VmStatus>;
  /** Contents of a serial port (default port 1). */
  getSerialOutput(name: string, port?: number): Promise<string>;
  startInstance(name: string): Promise<void>;
  stopInstance(name: string): Promise<void>;
  /** Delete an instance. Missing instances are ignored. */
  deleteInstance(name: string): Promise<void>;
  /** Email of the first service account attached to the instance. */
  getServiceAccountEmail(name: string): Promise<string | undefined>;
}
