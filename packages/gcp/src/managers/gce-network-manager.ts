/**
 * GCE Network Manager
 *
 * Manages ingress firewall rules and the Cloud Router / Cloud NAT that gives
 * an instance without an external IP outbound access.
 */

import { FirewallsClient, RoutersClient } from "@google-cloud/compute";
import type { protos } from "@google-cloud/compute";
import { isNotFoundError } from "@tunnelgate/core";
import type { FirewallOutcome, FirewallSpec, GceLogCallback } from "../types";
import type { IGceNetworkManager, IGceOperationManager } from "./interfaces";

type Firewall = protos.google.cloud.compute.v1.IFirewall;
type Router = protos.google.cloud.compute.v1.IRouter;

function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  return JSON.stringify([...a].sort()) === JSON.stringify([...b].sort());
}

/**
 * Manages GCE networking resources.
 */
export class GceNetworkManager implements IGceNetworkManager {
  constructor(
    private readonly firewallsClient: FirewallsClient,
    private readonly routersClient: RoutersClient,
    private readonly operationManager: IGceOperationManager,
    private readonly project: string,
    private readonly region: string,
    private readonly log: GceLogCallback
  ) {}

  private networkUrl(network: string): string {
    return `projects/${this.project}/global/networks/${network}`;
  }

  async ensureFirewall(spec: FirewallSpec): Promise<FirewallOutcome> {
    const entries = [{ IPProtocol: spec.protocol, ports: spec.ports }];

    const existing = await this.getFirewall(spec.name);
    if (!existing) {
      const [operation] = await this.firewallsClient.insert({
        project: this.project,
        firewallResource: {
          name: spec.name,
          network: this.networkUrl(spec.network),
          description: spec.description,
          direction: "INGRESS",
          priority: spec.priority,
          ...(spec.action === "allow" ? { allowed: entries } : { denied: entries }),
          sourceRanges: spec.sourceRanges,
          targetTags: spec.targetTags,
        },
      });
      await this.operationManager.waitForOperation(operation, "global", {
        description: `create firewall ${spec.name}`,
      });
      return "created";
    }

    if (!spec.updateExisting) {
      this.log(`  Firewall rule ${spec.name} already exists`, "stdout");
      return "unchanged";
    }

    const current = (spec.action === "allow" ? existing.allowed : existing.denied) ?? [];
    const currentProtocols = current.map((entry) => (entry.IPProtocol ?? "").toLowerCase());
    const currentPorts = current.flatMap((entry) => entry.ports ?? []);
    if (
      sameMembers(currentProtocols, [spec.protocol.toLowerCase()]) &&
      sameMembers(currentPorts, spec.ports) &&
      sameMembers(existing.sourceRanges ?? [], spec.sourceRanges) &&
      sameMembers(existing.targetTags ?? [], spec.targetTags)
    ) {
      return "unchanged";
    }

    const [operation] = await this.firewallsClient.patch({
      project: this.project,
      firewall: spec.name,
      firewallResource: {
        ...(spec.action === "allow" ? { allowed: entries } : { denied: entries }),
        sourceRanges: spec.sourceRanges,
        targetTags: spec.targetTags,
      },
    });
    await this.operationManager.waitForOperation(operation, "global", {
      description: `update firewall ${spec.name}`,
    });
    return "updated";
  }

  async firewallExists(name: string): Promise<boolean> {
    return (await this.getFirewall(name)) !== undefined;
  }

  async ensureNat(routerName: string, natName: string, network: string): Promise<boolean> {
    const nat = {
      name: natName,
      natIpAllocateOption: "AUTO_ONLY",
      sourceSubnetworkIpRangesToNat: "ALL_SUBNETWORKS_ALL_IP_RANGES",
    };

    const router = await this.getRouter(routerName);
    if (!router) {
      const [operation] = await this.routersClient.insert({
        project: this.project,
        region: this.region,
        routerResource: {
          name: routerName,
          network: this.networkUrl(network),
          region: this.region,
          nats: [nat],
        },
      });
      await this.operationManager.waitForOperation(operation, "region", {
        description: `create router ${routerName}`,
      });
      return true;
    }

    const nats = router.nats ?? [];
    if (nats.some((existing) => existing.name === natName)) {
      this.log(`  Cloud NAT ${natName} already exists`, "stdout");
      return false;
    }

    const [operation] = await this.routersClient.patch({
      project: this.project,
      region: this.region,
      router: routerName,
      routerResource: { nats: [...nats, nat] },
    });
    await this.operationManager.waitForOperation(operation, "region", {
      description: `add NAT ${natName}`,
    });
    return true;
  }

  async natExists(routerName: string, natName: string): Promise<boolean> {
    const router = await this.getRouter(routerName);
    return (router?.nats ?? []).some((nat) => nat.name === natName);
  }

  async deleteFirewall(name: string): Promise<void> {
    try {
      const [operation] = await this.firewallsClient.delete({
        project: this.project,
        firewall: name,
      });
      await this.operationManager.waitForOperation(operation, "global", {
        description: "delete firewall",
      });
    } catch (error: unknown) {
      if (!isNotFoundError(error)) throw error;
    }
  }

  async deleteRouter(name: string): Promise<void> {
    try {
      const [operation] = await this.routersClient.delete({
        project: this.project,
        region: this.region,
        router: name,
      });
      await this.operationManager.waitForOperation(operation, "region", {
        description: "delete router",
      });
    } catch (error: unknown) {
      if (!isNotFoundError(error)) throw error;
    }
  }

  private async getFirewall(name: string): Promise<Firewall | undefined> {
    try {
      const [firewall] = await this.firewallsClient.get({ project: this.project, firewall: name });
      return firewall;
    } catch (error: unknown) {
      if (isNotFoundError(error)) return undefined;
      throw error;
    }
  }

  private async getRouter(name: string): Promise<Router | undefined> {
    try {
      const [router] = await this.routersClient.get({
        project: this.project,
        region: this.region,
        router: name,
      });
      return router;
    } catch (error: unknown) {
      if (isNotFoundError(error)) return undefined;
      throw error;
    }
  }
}
