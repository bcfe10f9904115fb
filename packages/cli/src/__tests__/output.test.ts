import { ProvisionError, ProvisionErrorType } from "@tunnelgate/core";
import { createProgressRenderer, printError } from "../utils/output";

function createSpinner() {
  return {
    start: jest.fn(),
    succeed: jest.fn(),
    info: jest.fn(),
    fail: jest.fn(),
  };
}

describe("createProgressRenderer", () => {
  it("should map step transitions onto the spinner", () => {
    const spinner = createSpinner();
    const render = createProgressRenderer(spinner as never);

    render("enable_apis", "in_progress", "Enabling required APIs");
    render("enable_apis", "complete", "APIs already enabled");
    render("nat", "skipped", "Cloud NAT already exists");
    render("create_vm", "error", "quota exceeded");

    expect(spinner.start).toHaveBeenCalledWith("Enabling required APIs");
    expect(spinner.succeed).toHaveBeenCalledWith("APIs already enabled");
    expect(spinner.info).toHaveBeenCalledWith(expect.stringContaining("Cloud NAT already exists"));
    expect(spinner.fail).toHaveBeenCalledWith("quota exceeded");
  });

  it("should fall back to the step name", () => {
    const spinner = createSpinner();
    const render = createProgressRenderer(spinner as never);

    render("grant_iap", "in_progress");
    render("grant_iap", "complete");

    expect(spinner.start).toHaveBeenCalledWith("grant_iap...");
    expect(spinner.succeed).toHaveBeenCalledWith("Completed: grant_iap");
  });
});

describe("printError", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("should print the message and every suggestion", () => {
    printError(
      new ProvisionError("No project set", ProvisionErrorType.CONFIGURATION, undefined, [
        "gcloud config set project PROJECT_ID",
        "or pass --project PROJECT_ID",
      ])
    );

    const lines = errorSpy.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.includes("No project set"))).toBe(true);
    expect(lines.some((line) => line.includes("gcloud config set project PROJECT_ID"))).toBe(true);
    expect(lines.some((line) => line.includes("or pass --project PROJECT_ID"))).toBe(true);
  });
});
