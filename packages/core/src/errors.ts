/**
 * Error taxonomy for provisioning operations.
 *
 * Google API clients reject with errors carrying a numeric gRPC `code`
 * (and, for REST fallbacks, an HTTP status in the message). Everything the
 * pipeline surfaces to the operator is normalized into a ProvisionError with
 * remediation commands attached.
 */

export enum ProvisionErrorType {
  AUTHENTICATION = "AUTHENTICATION",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  NOT_FOUND = "NOT_FOUND",
  ALREADY_EXISTS = "ALREADY_EXISTS",
  QUOTA_EXCEEDED = "QUOTA_EXCEEDED",
  NETWORK = "NETWORK",
  CONFIGURATION = "CONFIGURATION",
  TIMEOUT = "TIMEOUT",
  UNKNOWN = "UNKNOWN",
}

export class ProvisionError extends Error {
  constructor(
    message: string,
    public readonly type: ProvisionErrorType,
    public readonly originalError?: Error,
    public readonly suggestions: string[] = []
  ) {
    super(message);
    this.name = "ProvisionError";
  }
}

/** gRPC status codes returned by Google Cloud client libraries */
const GRPC = {
  DEADLINE_EXCEEDED: 4,
  NOT_FOUND: 5,
  ALREADY_EXISTS: 6,
  PERMISSION_DENIED: 7,
  RESOURCE_EXHAUSTED: 8,
  ABORTED: 10,
  UNAVAILABLE: 14,
  UNAUTHENTICATED: 16,
} as const;

function errorCode(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    if (typeof code === "number") return code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFoundError(error: unknown): boolean {
  if (errorCode(error) === GRPC.NOT_FOUND) return true;
  const message = errorMessage(error);
  return message.includes("NOT_FOUND") || message.includes("404");
}

export function isAlreadyExistsError(error: unknown): boolean {
  if (errorCode(error) === GRPC.ALREADY_EXISTS) return true;
  const message = errorMessage(error);
  return message.includes("ALREADY_EXISTS") || message.toLowerCase().includes("already exists");
}

/** Concurrent IAM policy writes fail with ABORTED (or HTTP 409) on etag mismatch. */
export function isConcurrencyError(error: unknown): boolean {
  if (errorCode(error) === GRPC.ABORTED) return true;
  const message = errorMessage(error);
  return message.includes("ABORTED") || message.includes("409");
}

export interface ParsedGcpError {
  type: ProvisionErrorType;
  message: string;
  suggestions: string[];
}

/**
 * Classify an error thrown by a Google Cloud client library.
 */
export function parseGcpError(error: unknown, projectId?: string): ParsedGcpError {
  if (error instanceof ProvisionError) {
    return { type: error.type, message: error.message, suggestions: error.suggestions };
  }

  const code = errorCode(error);
  const message = errorMessage(error);
  const project = projectId ?? "PROJECT_ID";

  if (code === GRPC.UNAUTHENTICATED || message.includes("Could not load the default credentials")) {
    return {
      type: ProvisionErrorType.AUTHENTICATION,
      message: "Google Cloud credentials are missing or expired",
      suggestions: [
        "gcloud auth login",
        "gcloud auth application-default login",
      ],
    };
  }

  // A disabled API also answers PERMISSION_DENIED / 403
  if (message.includes("SERVICE_DISABLED") || message.includes("has not been used")) {
    const api = /([a-z][a-z0-9-]*\.googleapis\.com)/.exec(message)?.[1] ?? "cloudresourcemanager.googleapis.com";
    return {
      type: ProvisionErrorType.CONFIGURATION,
      message: `API ${api} is not enabled in project ${project}`,
      suggestions: [`gcloud services enable ${api} --project=${project}`],
    };
  }

  if (code === GRPC.PERMISSION_DENIED || message.includes("PERMISSION_DENIED") || message.includes("403")) {
    return {
      type: ProvisionErrorType.PERMISSION_DENIED,
      message: `Permission denied: ${message}`,
      suggestions: [
        `gcloud projects get-iam-policy ${project} --flatten="bindings[].members" --filter="bindings.members:$(gcloud config get-value account)"`,
      ],
    };
  }

  if (isNotFoundError(error)) {
    return {
      type: ProvisionErrorType.NOT_FOUND,
      message: `Resource not found: ${message}`,
      suggestions: [`gcloud config set project ${project}`],
    };
  }

  if (isAlreadyExistsError(error)) {
    return {
      type: ProvisionErrorType.ALREADY_EXISTS,
      message: `Resource already exists: ${message}`,
      suggestions: [],
    };
  }

  if (code === GRPC.RESOURCE_EXHAUSTED || message.includes("QUOTA") || message.includes("RESOURCE_EXHAUSTED")) {
    return {
      type: ProvisionErrorType.QUOTA_EXCEEDED,
      message: `Quota exceeded: ${message}`,
      suggestions: [`gcloud compute project-info describe --project=${project}`],
    };
  }

  if (code === GRPC.DEADLINE_EXCEEDED || message.toLowerCase().includes("timed out")) {
    return {
      type: ProvisionErrorType.TIMEOUT,
      message,
      suggestions: ["Re-run the command; completed steps are skipped"],
    };
  }

  if (code === GRPC.UNAVAILABLE || message.includes("ECONN") || message.includes("ETIMEDOUT")) {
    return {
      type: ProvisionErrorType.NETWORK,
      message: `Network error: ${message}`,
      suggestions: ["Check your connection and re-run the command"],
    };
  }

  return { type: ProvisionErrorType.UNKNOWN, message, suggestions: [] };
}

/**
 * Wrap any thrown value into a ProvisionError.
 */
export function toProvisionError(error: unknown, projectId?: string): ProvisionError {
  if (error instanceof ProvisionError) return error;
  const parsed = parseGcpError(error, projectId);
  return new ProvisionError(
    parsed.message,
    parsed.type,
    error instanceof Error ? error : undefined,
    parsed.suggestions
  );
}
