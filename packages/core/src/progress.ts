/**
 * Step-by-step progress reporting for the provisioning pipeline.
 */

export type PipelineStep =
  | "check_permissions"
  | "enable_apis"
  | "setup_secrets"
  | "firewall_allow"
  | "firewall_deny"
  | "nat"
  | "create_vm"
  | "grant_iap"
  | "health_check";

export const PIPELINE_STEPS: readonly PipelineStep[] = [
  "check_permissions",
  "enable_apis",
  "setup_secrets",
  "firewall_allow",
  "firewall_deny",
  "nat",
  "create_vm",
  "grant_iap",
  "health_check",
];

export type StepStatus = "pending" | "in_progress" | "complete" | "skipped" | "error";

export type ProgressCallback<S extends string = PipelineStep> = (
  step: S,
  status: StepStatus,
  message?: string
) => void;

interface StepState {
  status: StepStatus;
  message: string;
}

export interface ProgressSummary {
  completed: number;
  skipped: number;
  total: number;
  errors: string[];
}

export class ProgressTracker<S extends string = PipelineStep> {
  private steps: Map<S, StepState> = new Map();

  constructor(
    stepIds: readonly S[],
    private onProgress?: ProgressCallback<S>
  ) {
    for (const step of stepIds) {
      this.steps.set(step, { status: "pending", message: "" });
    }
  }

  start(step: S, message?: string): void {
    this.steps.set(step, { status: "in_progress", message: message || `${step}...` });
    this.onProgress?.(step, "in_progress", message);
  }

  complete(step: S, message?: string): void {
    const finalMessage = message || `${step} complete`;
    this.steps.set(step, { status: "complete", message: finalMessage });
    this.onProgress?.(step, "complete", finalMessage);
  }

  skip(step: S, message?: string): void {
    const finalMessage = message || `${step} skipped`;
    this.steps.set(step, { status: "skipped", message: finalMessage });
    this.onProgress?.(step, "skipped", finalMessage);
  }

  error(step: S, message: string): void {
    this.steps.set(step, { status: "error", message });
    this.onProgress?.(step, "error", message);
  }

  getStatus(step: S): StepStatus | "unknown" {
    return this.steps.get(step)?.status ?? "unknown";
  }

  /** Every step finished, either completed or skipped */
  isComplete(): boolean {
    return Array.from(this.steps.values()).every(
      (s) => s.status === "complete" || s.status === "skipped"
    );
  }

  hasErrors(): boolean {
    return Array.from(this.steps.values()).some((s) => s.status === "error");
  }

  getSummary(): ProgressSummary {
    const values = Array.from(this.steps.values());
    return {
      completed: values.filter((s) => s.status === "complete").length,
      skipped: values.filter((s) => s.status === "skipped").length,
      total: values.length,
      errors: values.filter((s) => s.status === "error").map((s) => s.message),
    };
  }
}
