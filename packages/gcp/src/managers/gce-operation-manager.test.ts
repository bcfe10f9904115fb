import { GceOperationManager, getOperationName } from "./gce-operation-manager";
import { ProvisionError } from "@tunnelgate/core";

jest.mock("@google-cloud/compute", () => ({
  GlobalOperationsClient: jest.fn(),
  ZoneOperationsClient: jest.fn(),
  RegionOperationsClient: jest.fn(),
}));

// ── Test helpers ───────────────────────────────────────────────────────

function createManager() {
  const globalOps = { get: jest.fn() };
  const zoneOps = { get: jest.fn() };
  const regionOps = { get: jest.fn() };
  const log = jest.fn();

  const manager = new GceOperationManager(
    globalOps as never,
    zoneOps as never,
    regionOps as never,
    "test-project",
    "us-central1-a",
    "us-central1",
    log
  );

  return { manager, globalOps, zoneOps, regionOps, log };
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("getOperationName", () => {
  it("should read the name from the operation", () => {
    expect(getOperationName({ name: "operation-123" })).toBe("operation-123");
  });

  it("should strip a resource path", () => {
    expect(getOperationName({ name: "projects/p/zones/z/operations/op-9" })).toBe("op-9");
  });

  it("should fall back to latestResponse", () => {
    expect(getOperationName({ latestResponse: { name: "op-7" } })).toBe("op-7");
  });

  it("should return undefined for anything else", () => {
    expect(getOperationName(undefined)).toBeUndefined();
    expect(getOperationName({ name: "" })).toBeUndefined();
    expect(getOperationName("op")).toBeUndefined();
  });
});

describe("GceOperationManager", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("should return immediately for operations without a name", async () => {
    const { manager, globalOps } = createManager();

    await manager.waitForOperation({}, "global");

    expect(globalOps.get).not.toHaveBeenCalled();
  });

  it("should poll the zone client until DONE", async () => {
    const { manager, zoneOps } = createManager();
    zoneOps.get
      .mockResolvedValueOnce([{ status: "RUNNING", progress: 50 }])
      .mockResolvedValueOnce([{ status: "DONE", progress: 100 }]);

    await manager.waitForOperation({ name: "op-1" }, "zone", { pollIntervalMs: 0 });

    expect(zoneOps.get).toHaveBeenCalledTimes(2);
    expect(zoneOps.get).toHaveBeenCalledWith({
      project: "test-project",
      zone: "us-central1-a",
      operation: "op-1",
    });
  });

  it("should use the region client for region operations", async () => {
    const { manager, regionOps } = createManager();
    regionOps.get.mockResolvedValue([{ status: "DONE" }]);

    await manager.waitForOperation({ name: "op-2" }, "region");

    expect(regionOps.get).toHaveBeenCalledWith({
      project: "test-project",
      region: "us-central1",
      operation: "op-2",
    });
  });

  it("should surface operation errors", async () => {
    const { manager, globalOps, log } = createManager();
    globalOps.get.mockResolvedValue([
      { status: "DONE", error: { errors: [{ message: "Quota 'FIREWALLS' exceeded" }] } },
    ]);

    await expect(
      manager.waitForOperation({ name: "op-3" }, "global", { description: "create firewall" })
    ).rejects.toThrow("Quota 'FIREWALLS' exceeded");
    expect(log).toHaveBeenCalledWith("  [create firewall] FAILED: Quota 'FIREWALLS' exceeded", "stderr");
  });

  it("should time out with a ProvisionError", async () => {
    const { manager, globalOps } = createManager();
    globalOps.get.mockResolvedValue([{ status: "RUNNING" }]);

    await expect(
      manager.waitForOperation({ name: "op-4" }, "global", { timeoutMs: 0 })
    ).rejects.toBeInstanceOf(ProvisionError);
  });
});
