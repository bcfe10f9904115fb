import { PIPELINE_STEPS, ProgressTracker } from "../progress";

describe("ProgressTracker", () => {
  it("should start every step as pending", () => {
    const tracker = new ProgressTracker(PIPELINE_STEPS);

    expect(tracker.getStatus("check_permissions")).toBe("pending");
    expect(tracker.getSummary()).toEqual({ completed: 0, skipped: 0, total: 9, errors: [] });
  });

  it("should report transitions to the callback", () => {
    const onProgress = jest.fn();
    const tracker = new ProgressTracker(["nat", "create_vm"], onProgress);

    tracker.start("nat", "Creating NAT");
    tracker.skip("nat", "NAT disabled");
    tracker.start("create_vm");
    tracker.complete("create_vm");

    expect(onProgress.mock.calls).toEqual([
      ["nat", "in_progress", "Creating NAT"],
      ["nat", "skipped", "NAT disabled"],
      ["create_vm", "in_progress", undefined],
      ["create_vm", "complete", "create_vm complete"],
    ]);
  });

  it("should treat skipped steps as finished", () => {
    const tracker = new ProgressTracker(["nat", "create_vm"]);

    tracker.skip("nat");
    expect(tracker.isComplete()).toBe(false);

    tracker.complete("create_vm");
    expect(tracker.isComplete()).toBe(true);
    expect(tracker.getSummary()).toEqual({ completed: 1, skipped: 1, total: 2, errors: [] });
  });

  it("should collect error messages", () => {
    const tracker = new ProgressTracker(["enable_apis", "nat"]);

    tracker.error("enable_apis", "quota exceeded");

    expect(tracker.hasErrors()).toBe(true);
    expect(tracker.isComplete()).toBe(false);
    expect(tracker.getSummary().errors).toEqual(["quota exceeded"]);
    expect(tracker.getStatus("enable_apis")).toBe("error");
  });
});
