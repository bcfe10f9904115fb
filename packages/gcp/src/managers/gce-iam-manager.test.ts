import { GceIamManager } from "./gce-iam-manager";

jest.mock("@google-cloud/resource-manager", () => ({
  ProjectsClient: jest.fn(),
}));

// ── Test helpers ───────────────────────────────────────────────────────

function createManager() {
  const client = {
    getIamPolicy: jest.fn(),
    setIamPolicy: jest.fn().mockResolvedValue([{}]),
    testIamPermissions: jest.fn(),
  };
  const log = jest.fn();
  const manager = new GceIamManager(client as never, "test-project", log);
  return { manager, client, log };
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("GceIamManager", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("testPermissions", () => {
    it("should return the permissions not granted", async () => {
      const { manager, client } = createManager();
      client.testIamPermissions.mockResolvedValue([{ permissions: ["compute.instances.create"] }]);

      const missing = await manager.testPermissions(["compute.instances.create", "iap.tunnelInstances.accessViaIAP"]);

      expect(missing).toEqual(["iap.tunnelInstances.accessViaIAP"]);
      expect(client.testIamPermissions).toHaveBeenCalledWith({
        resource: "projects/test-project",
        permissions: ["compute.instances.create", "iap.tunnelInstances.accessViaIAP"],
      });
    });

    it("should treat a missing permissions list as nothing granted", async () => {
      const { manager, client } = createManager();
      client.testIamPermissions.mockResolvedValue([{}]);

      expect(await manager.testPermissions(["a.b.c"])).toEqual(["a.b.c"]);
    });
  });

  describe("addProjectBinding", () => {
    it("should return false when the member already has the role", async () => {
      const { manager, client } = createManager();
      client.getIamPolicy.mockResolvedValue([
        { etag: "abc", bindings: [{ role: "roles/viewer", members: ["user:a@example.com"] }] },
      ]);

      const added = await manager.addProjectBinding("user:a@example.com", "roles/viewer");

      expect(added).toBe(false);
      expect(client.setIamPolicy).not.toHaveBeenCalled();
    });

    it("should append to an existing binding and keep the etag", async () => {
      const { manager, client } = createManager();
      client.getIamPolicy.mockResolvedValue([
        { etag: "abc", bindings: [{ role: "roles/viewer", members: ["user:a@example.com"] }] },
      ]);

      const added = await manager.addProjectBinding("user:b@example.com", "roles/viewer");

      expect(added).toBe(true);
      expect(client.setIamPolicy).toHaveBeenCalledWith({
        resource: "projects/test-project",
        policy: {
          etag: "abc",
          version: 3,
          bindings: [{ role: "roles/viewer", members: ["user:a@example.com", "user:b@example.com"] }],
        },
      });
    });

    it("should add a new binding for a new role", async () => {
      const { manager, client } = createManager();
      client.getIamPolicy.mockResolvedValue([{ etag: "abc" }]);

      await manager.addProjectBinding("serviceAccount:vm@p.iam.gserviceaccount.com", "roles/secretmanager.secretAccessor");

      expect(client.setIamPolicy).toHaveBeenCalledWith({
        resource: "projects/test-project",
        policy: {
          etag: "abc",
          version: 3,
          bindings: [
            {
              role: "roles/secretmanager.secretAccessor",
              members: ["serviceAccount:vm@p.iam.gserviceaccount.com"],
            },
          ],
        },
      });
    });

    it("should read and write the policy as version 3", async () => {
      const { manager, client } = createManager();
      client.getIamPolicy.mockResolvedValue([{ version: 1, etag: "abc", bindings: [] }]);

      await manager.addProjectBinding("user:a@example.com", "roles/viewer");

      expect(client.getIamPolicy).toHaveBeenCalledWith({
        resource: "projects/test-project",
        options: { requestedPolicyVersion: 3 },
      });
      expect(client.setIamPolicy).toHaveBeenCalledWith({
        resource: "projects/test-project",
        policy: {
          version: 3,
          etag: "abc",
          bindings: [{ role: "roles/viewer", members: ["user:a@example.com"] }],
        },
      });
    });

    it("should keep conditional bindings when adding an unconditional one", async () => {
      const { manager, client } = createManager();
      client.getIamPolicy.mockResolvedValue([
        {
          version: 3,
          bindings: [
            { role: "roles/viewer", members: ["user:a@example.com"], condition: { expression: "true" } },
          ],
        },
      ]);

      const added = await manager.addProjectBinding("user:a@example.com", "roles/viewer");

      expect(added).toBe(true);
      const { policy } = client.setIamPolicy.mock.calls[0][0];
      expect(policy.version).toBe(3);
      expect(policy.bindings).toHaveLength(2);
      expect(policy.bindings[0].condition).toEqual({ expression: "true" });
      expect(policy.bindings[1]).toEqual({ role: "roles/viewer", members: ["user:a@example.com"] });
    });

    it("should re-read and retry once on an etag conflict", async () => {
      const { manager, client, log } = createManager();
      client.getIamPolicy.mockResolvedValue([{ etag: "abc", bindings: [] }]);
      client.setIamPolicy
        .mockRejectedValueOnce(Object.assign(new Error("ABORTED: etag mismatch"), { code: 10 }))
        .mockResolvedValueOnce([{}]);

      const added = await manager.addProjectBinding("user:a@example.com", "roles/viewer");

      expect(added).toBe(true);
      expect(client.getIamPolicy).toHaveBeenCalledTimes(2);
      expect(client.setIamPolicy).toHaveBeenCalledTimes(2);
      expect(log).toHaveBeenCalledWith("  IAM policy changed concurrently, retrying", "stderr");
    });

    it("should not retry other errors", async () => {
      const { manager, client } = createManager();
      client.getIamPolicy.mockResolvedValue([{ bindings: [] }]);
      client.setIamPolicy.mockRejectedValue(new Error("PERMISSION_DENIED"));

      await expect(manager.addProjectBinding("user:a@example.com", "roles/viewer")).rejects.toThrow(
        "PERMISSION_DENIED"
      );
      expect(client.setIamPolicy).toHaveBeenCalledTimes(1);
    });
  });
});
