import { InvalidIdentityError } from "./errors.js";

const PROJECT_IDENTITY_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const RFC1123_LABEL_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

export const WORKLOAD_NAME_PREFIX = "dev-session-";

export function isValidProjectIdentity(value: unknown): value is string {
  return typeof value === "string" && PROJECT_IDENTITY_PATTERN.test(value);
}

export function assertProjectIdentity(value: unknown): string {
  if (!isValidProjectIdentity(value)) {
    throw new InvalidIdentityError("project identity");
  }
  return value;
}

// Kubernetes object names: 1-63 chars, lowercase alnum or hyphen, alnum at both ends.
export function isRfc1123Label(value: unknown): value is string {
  return typeof value === "string" && RFC1123_LABEL_PATTERN.test(value);
}

export function assertRfc1123Label(value: unknown, label: string): string {
  if (!isRfc1123Label(value)) {
    throw new InvalidIdentityError(label, "a DNS label (1-63 chars: lowercase letters, digits, hyphen)");
  }
  return value;
}

export function assertOwnerId(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new InvalidIdentityError(label, "a non-negative integer");
  }
  return value;
}

/** The namespace scoping one project's resources. */
export function isolationKeyFor(projectIdentity: string): string {
  return projectIdentity;
}

/** The Helm release name; also the prefix of every object the chart creates. */
export function workloadNameFor(projectIdentity: string): string {
  return `${WORKLOAD_NAME_PREFIX}${projectIdentity}`;
}
