import {
  ProvisionError,
  ProvisionErrorType,
  isAlreadyExistsError,
  isConcurrencyError,
  isNotFoundError,
  parseGcpError,
  toProvisionError,
} from "../errors";

function grpcError(code: number, message: string): Error & { code: number } {
  return Object.assign(new Error(message), { code });
}

describe("error predicates", () => {
  it("should detect NOT_FOUND by code or message", () => {
    expect(isNotFoundError(grpcError(5, "nope"))).toBe(true);
    expect(isNotFoundError(new Error("404 Not Found"))).toBe(true);
    expect(isNotFoundError(new Error("boom"))).toBe(false);
  });

  it("should detect ALREADY_EXISTS by code or message", () => {
    expect(isAlreadyExistsError(grpcError(6, "dup"))).toBe(true);
    expect(isAlreadyExistsError(new Error("The resource already exists"))).toBe(true);
    expect(isAlreadyExistsError("other")).toBe(false);
  });

  it("should detect etag conflicts", () => {
    expect(isConcurrencyError(grpcError(10, "aborted"))).toBe(true);
    expect(isConcurrencyError(new Error("409 Conflict"))).toBe(true);
    expect(isConcurrencyError(new Error("boom"))).toBe(false);
  });

  it("should ignore non-numeric codes", () => {
    expect(isNotFoundError({ code: "5" })).toBe(false);
  });
});

describe("parseGcpError", () => {
  it("should classify missing credentials", () => {
    expect(parseGcpError(grpcError(16, "unauthenticated"))).toEqual({
      type: ProvisionErrorType.AUTHENTICATION,
      message: "Google Cloud credentials are missing or expired",
      suggestions: ["gcloud auth login", "gcloud auth application-default login"],
    });
    expect(parseGcpError(new Error("Could not load the default credentials")).type).toBe(
      ProvisionErrorType.AUTHENTICATION
    );
  });

  it("should point permission errors at the project's IAM policy", () => {
    const parsed = parseGcpError(grpcError(7, "denied"), "my-project");

    expect(parsed.type).toBe(ProvisionErrorType.PERMISSION_DENIED);
    expect(parsed.message).toBe("Permission denied: denied");
    expect(parsed.suggestions[0]).toContain("gcloud projects get-iam-policy my-project");
  });

  it("should suggest enabling an API that is disabled", () => {
    const parsed = parseGcpError(
      grpcError(
        7,
        "7 PERMISSION_DENIED: Secret Manager API has not been used in project 123 before or it is disabled. " +
          "Enable it by visiting https://console.developers.google.com/apis/api/secretmanager.googleapis.com/overview?project=123"
      ),
      "my-project"
    );

    expect(parsed).toEqual({
      type: ProvisionErrorType.CONFIGURATION,
      message: "API secretmanager.googleapis.com is not enabled in project my-project",
      suggestions: ["gcloud services enable secretmanager.googleapis.com --project=my-project"],
    });
  });

  it("should fall back to the Resource Manager API when the disabled API is not named", () => {
    const parsed = parseGcpError(new Error("403 SERVICE_DISABLED"), "my-project");

    expect(parsed.type).toBe(ProvisionErrorType.CONFIGURATION);
    expect(parsed.suggestions).toEqual([
      "gcloud services enable cloudresourcemanager.googleapis.com --project=my-project",
    ]);
  });

  it.each([
    [grpcError(5, "x"), ProvisionErrorType.NOT_FOUND],
    [grpcError(6, "x"), ProvisionErrorType.ALREADY_EXISTS],
    [grpcError(8, "x"), ProvisionErrorType.QUOTA_EXCEEDED],
    [grpcError(4, "x"), ProvisionErrorType.TIMEOUT],
    [grpcError(14, "x"), ProvisionErrorType.NETWORK],
    [new Error("connect ECONNREFUSED"), ProvisionErrorType.NETWORK],
    [new Error("something odd"), ProvisionErrorType.UNKNOWN],
  ])("should classify %p", (error, type) => {
    expect(parseGcpError(error).type).toBe(type);
  });

  it("should pass ProvisionErrors through", () => {
    const error = new ProvisionError("bad", ProvisionErrorType.CONFIGURATION, undefined, ["fix it"]);
    expect(parseGcpError(error)).toEqual({
      type: ProvisionErrorType.CONFIGURATION,
      message: "bad",
      suggestions: ["fix it"],
    });
  });
});

describe("toProvisionError", () => {
  it("should wrap errors and keep the original", () => {
    const original = grpcError(8, "quota");

    const wrapped = toProvisionError(original, "my-project");

    expect(wrapped).toBeInstanceOf(ProvisionError);
    expect(wrapped.type).toBe(ProvisionErrorType.QUOTA_EXCEEDED);
    expect(wrapped.originalError).toBe(original);
    expect(wrapped.suggestions).toEqual(["gcloud compute project-info describe --project=my-project"]);
  });

  it("should return ProvisionErrors unchanged", () => {
    const error = new ProvisionError("t", ProvisionErrorType.TIMEOUT);
    expect(toProvisionError(error)).toBe(error);
  });

  it("should wrap non-Error values without an original", () => {
    const wrapped = toProvisionError("plain string");
    expect(wrapped.type).toBe(ProvisionErrorType.UNKNOWN);
    expect(wrapped.message).toBe("plain string");
    expect(wrapped.originalError).toBeUndefined();
  });
});
