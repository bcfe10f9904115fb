/**
 * Standard labels for cloud resources.
 */

export const LABEL_PREFIX = "tunnelgate";

export const RESOURCE_LABELS = {
  MANAGED: `${LABEL_PREFIX}-managed`,
  INSTANCE: `${LABEL_PREFIX}-instance`,
} as const;

export const MANAGED_VALUE = "true";

export function managedLabels(instanceName: string): Record<string, string> {
  return {
    [RESOURCE_LABELS.MANAGED]: MANAGED_VALUE,
    [RESOURCE_LABELS.INSTANCE]: instanceName,
  };
}
