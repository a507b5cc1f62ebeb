import { vi } from "vitest";
import { buildEndpointSet, type AddressResolver } from "../lib/endpoint-resolver.js";
import type { DeploymentDriver } from "../lib/helm-driver.js";
import type { RunResult } from "../lib/sh.js";
import type { NewSessionRecord } from "../lib/sessions-store.js";

export const PROJECT_ID = "11111111-1111-1111-1111-111111111111";
export const OTHER_PROJECT_ID = "22222222-2222-2222-2222-222222222222";

export function runResult(overrides: Partial<RunResult> = {}): RunResult {
  return { code: 0, stdout: "", stderr: "", timedOut: false, ...overrides };
}

export function fakeDriver() {
  return {
    apply: vi.fn<DeploymentDriver["apply"]>().mockResolvedValue(undefined),
    remove: vi.fn<DeploymentDriver["remove"]>().mockResolvedValue(undefined),
    status: vi.fn<DeploymentDriver["status"]>().mockResolvedValue("running"),
  } satisfies DeploymentDriver;
}

export function fakeResolver(address = "10.0.0.5") {
  return {
    resolve: vi.fn<AddressResolver["resolve"]>().mockResolvedValue({
      resolved: true,
      endpoints: buildEndpointSet(address),
    }),
  } satisfies AddressResolver;
}

export function draftSession(projectIdentity: string, overrides: Partial<NewSessionRecord> = {}): NewSessionRecord {
  return {
    projectIdentity,
    ownerUserId: 1,
    ownerProjectId: 2,
    isolationKey: projectIdentity,
    workloadName: `dev-session-${projectIdentity}`,
    status: "pending",
    token: `token-${projectIdentity}`,
    expiresAt: "2027-01-01T00:00:00.000Z",
    endpoints: buildEndpointSet(""),
    errorMessage: null,
    ...overrides,
  };
}
