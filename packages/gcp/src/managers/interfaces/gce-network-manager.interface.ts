/**
 * GCE Network Manager Interface
 *
 * Provides abstraction for firewall rules and Cloud NAT.
 */

import type { FirewallOutcome, FirewallSpec } from "../../types";

export interface IGceNetworkManager {
  /**
   * Ensure a firewall rule exists. An existing rule is patched only when
   * `spec.updateExisting` is set and its ports or source ranges differ.
   */
  ensureFirewall(spec: FirewallSpec): Promise<FirewallOutcome>;

  /** Check whether a firewall rule exists. */
  firewallExists(name: string): Promise<boolean>;

  /**
   * Ensure a Cloud Router with a Cloud NAT gateway exists in the region.
   *
   * @returns True when the router or the NAT had to be created
   */
  ensureNat(routerName: string, natName: string, network: string): Promise<boolean>;

  /** Check whether the router exists and carries the named NAT. */
  natExists(routerName: string, natName: string): Promise<boolean>;

  /** Delete a firewall rule. Missing rules are ignored. */
  deleteFirewall(name: string): Promise<void>;

  /** Delete a Cloud Router (and its NAT). Missing routers are ignored. */
  deleteRouter(name: string): Promise<void>;
}
