import { GceLoggingManager } from "./gce-logging-manager";

jest.mock("@google-cloud/logging", () => ({
  Logging: jest.fn(),
}));

// ── Test helpers ───────────────────────────────────────────────────────

function createManager() {
  const logging = {
    getEntries: jest.fn().mockResolvedValue([[]]),
  };
  const manager = new GceLoggingManager(logging as never, "test-project", "us-central1-a");
  return { manager, logging };
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("GceLoggingManager", () => {
  it("should query the startup-script log of the instance", async () => {
    const { manager, logging } = createManager();

    await manager.getStartupLogs("iap-vps", { lines: 20 });

    expect(logging.getEntries).toHaveBeenCalledWith({
      filter:
        'resource.type="gce_instance" AND log_id("google_metadata_script_runner") AND ' +
        'labels."compute.googleapis.com/resource_name"="iap-vps" AND resource.labels.zone="us-central1-a"',
      orderBy: "timestamp desc",
      pageSize: 20,
      autoPaginate: false,
    });
  });

  it("should return entries oldest first as text", async () => {
    const { manager, logging } = createManager();
    logging.getEntries.mockResolvedValue([
      [
        { data: { message: "openclaw provisioning complete." } },
        { data: "Installing openclaw" },
      ],
    ]);

    expect(await manager.getStartupLogs("iap-vps")).toEqual([
      "Installing openclaw",
      "openclaw provisioning complete.",
    ]);
    expect(logging.getEntries.mock.calls[0][0].pageSize).toBe(100);
  });

  it("should build a console link scoped to the project", () => {
    const { manager } = createManager();

    const link = manager.getConsoleLink("iap-vps");

    expect(link.startsWith("https://console.cloud.google.com/logs/query;query=")).toBe(true);
    expect(link.endsWith("?project=test-project")).toBe(true);
    expect(decodeURIComponent(link)).toContain('labels."compute.googleapis.com/resource_name"="iap-vps"');
  });
});
