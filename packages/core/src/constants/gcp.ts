/**
 * Google Cloud identifiers the pipeline depends on.
 */

/** Source range IAP uses for TCP forwarding */
export const IAP_TCP_FORWARDING_CIDR = "35.235.240.0/20";

export const PUBLIC_CIDR = "0.0.0.0/0";

export const REQUIRED_APIS = [
  "compute.googleapis.com",
  "iap.googleapis.com",
  "secretmanager.googleapis.com",
  "cloudresourcemanager.googleapis.com",
] as const;

export const IAP_TUNNEL_ROLE = "roles/iap.tunnelResourceAccessor";
export const SECRET_ACCESSOR_ROLE = "roles/secretmanager.secretAccessor";

/** Permissions the caller needs before anything is created */
export const REQUIRED_PERMISSIONS = [
  "compute.firewalls.create",
  "compute.firewalls.get",
  "compute.firewalls.update",
  "compute.instances.create",
  "compute.instances.get",
  "compute.routers.create",
  "compute.routers.get",
  "compute.routers.update",
  "resourcemanager.projects.getIamPolicy",
  "resourcemanager.projects.setIamPolicy",
  "serviceusage.services.enable",
  "secretmanager.secrets.create",
  "secretmanager.secrets.list",
] as const;

/** Roles that together cover REQUIRED_PERMISSIONS */
export const OPERATOR_ROLES = [
  "roles/compute.admin",
  "roles/iap.admin",
  "roles/secretmanager.admin",
  "roles/serviceusage.serviceUsageAdmin",
  "roles/resourcemanager.projectIamAdmin",
] as const;

export const CLOUD_PLATFORM_SCOPE = "https://www.googleapis.com/auth/cloud-platform";

export const METADATA_URL = "http://metadata.google.internal/computeMetadata/v1";
export const SECRET_MANAGER_URL = "https://secretmanager.googleapis.com/v1";
