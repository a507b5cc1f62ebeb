import { describe, expect, it, vi } from "vitest";
import { DeployError, InvalidIdentityError } from "../lib/errors.js";
import { HelmDriver } from "../lib/helm-driver.js";
import { createSilentLogger } from "../lib/logger.js";
import type { CommandRunner } from "../lib/sh.js";
import { PROJECT_ID, runResult } from "./helpers.js";

const RELEASE = `dev-session-${PROJECT_ID}`;

function createDriver(runner: CommandRunner, options: { kubeContext?: string; timeoutMs?: number } = {}) {
  return new HelmDriver({
    chartPath: "./helm/dev-session-template",
    logger: createSilentLogger(),
    runner,
    ...options,
  });
}

const MALFORMED_IDENTITIES = [
  "",
  "not-a-uuid",
  "11111111-1111-1111-1111-11111111111",
  "11111111-1111-1111-1111-111111111111 --set evil=1",
  "11111111-1111-1111-1111-111111111111;reboot",
  "../11111111-1111-1111-1111-111111111111",
];

describe("HelmDriver.apply", () => {
  it("runs an idempotent upgrade --install into the project namespace", async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(runResult({ stdout: "Release has been upgraded" }));
    const driver = createDriver(runner);

    await driver.apply(PROJECT_ID, 2, 1);

    expect(runner).toHaveBeenCalledTimes(1);
    expect(runner).toHaveBeenCalledWith(
      [
        "helm",
        "upgrade",
        "--install",
        RELEASE,
        "./helm/dev-session-template",
        "--namespace",
        PROJECT_ID,
        "--create-namespace",
        "--set",
        `project.uuid=${PROJECT_ID}`,
        "--set",
        "project.id=2",
        "--set",
        "user.id=1",
        "--wait",
        "--timeout",
        "300s",
      ],
      { timeoutMs: 330_000 },
    );
  });

  it("passes the configured kube context and timeout", async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(runResult());
    const driver = createDriver(runner, { kubeContext: "staging", timeoutMs: 90_000 });

    await driver.apply(PROJECT_ID, 2, 1);

    const [argv, opts] = runner.mock.calls[0] ?? [];
    expect(argv?.slice(-4)).toEqual(["--timeout", "90s", "--kube-context", "staging"]);
    expect(opts).toEqual({ timeoutMs: 120_000 });
  });

  it("surfaces the tool output when helm exits non-zero", async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(
      runResult({ code: 1, stderr: "Error: INSTALLATION FAILED: quota exceeded\n" }),
    );
    const driver = createDriver(runner);

    const error = await driver.apply(PROJECT_ID, 2, 1).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeployError);
    expect(error).toMatchObject({
      exitCode: 1,
      timedOut: false,
      output: "Error: INSTALLATION FAILED: quota exceeded",
      message: "helm upgrade --install exited with code 1: Error: INSTALLATION FAILED: quota exceeded",
    });
  });

  it("reports a timeout as a DeployError", async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(
      runResult({ code: 143, stdout: "waiting for pods", timedOut: true }),
    );
    const driver = createDriver(runner);

    const error = await driver.apply(PROJECT_ID, 2, 1).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeployError);
    expect(error).toMatchObject({
      exitCode: null,
      timedOut: true,
      message: "helm upgrade --install timed out: waiting for pods",
    });
  });

  it("rejects negative owner ids without running helm", async () => {
    const runner = vi.fn<CommandRunner>();
    const driver = createDriver(runner);

    await expect(driver.apply(PROJECT_ID, -1, 1)).rejects.toBeInstanceOf(InvalidIdentityError);
    expect(runner).not.toHaveBeenCalled();
  });
});

describe("HelmDriver identity validation", () => {
  it.each(MALFORMED_IDENTITIES)("never runs helm for %j", async (identity) => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(runResult());
    const driver = createDriver(runner);

    await expect(driver.apply(identity, 2, 1)).rejects.toBeInstanceOf(InvalidIdentityError);
    await expect(driver.remove(identity)).rejects.toBeInstanceOf(InvalidIdentityError);
    await expect(driver.status(identity)).rejects.toBeInstanceOf(InvalidIdentityError);
    expect(runner).toHaveBeenCalledTimes(0);
  });
});

describe("HelmDriver.remove", () => {
  it("uninstalls the release and leaves the namespace alone", async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(runResult({ stdout: `release "${RELEASE}" uninstalled` }));
    const driver = createDriver(runner);

    await driver.remove(PROJECT_ID);

    expect(runner).toHaveBeenCalledWith(
      ["helm", "uninstall", RELEASE, "--namespace", PROJECT_ID, "--wait", "--timeout", "300s"],
      { timeoutMs: 330_000 },
    );
  });

  it("treats a missing release as already removed", async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(
      runResult({ code: 1, stderr: `Error: uninstall: Release not loaded: ${RELEASE}: release: not found` }),
    );
    const driver = createDriver(runner);

    await expect(driver.remove(PROJECT_ID)).resolves.toBeUndefined();
  });

  it("fails on other errors", async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(
      runResult({ code: 1, stderr: "Error: Kubernetes cluster unreachable" }),
    );
    const driver = createDriver(runner);

    await expect(driver.remove(PROJECT_ID)).rejects.toThrow(
      "helm uninstall exited with code 1: Error: Kubernetes cluster unreachable",
    );
  });
});

describe("HelmDriver.status", () => {
  it("parses the release status and translates it", async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(
      runResult({ stdout: JSON.stringify({ name: RELEASE, info: { status: "deployed" }, version: 3 }) }),
    );
    const driver = createDriver(runner);

    await expect(driver.status(PROJECT_ID)).resolves.toBe("running");
    expect(runner).toHaveBeenCalledWith(
      ["helm", "status", RELEASE, "--namespace", PROJECT_ID, "--output", "json"],
      { timeoutMs: 330_000 },
    );
  });

  it("maps in-flight releases to pending", async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(
      runResult({ stdout: JSON.stringify({ info: { status: "pending-upgrade" } }) }),
    );

    await expect(createDriver(runner).status(PROJECT_ID)).resolves.toBe("pending");
  });

  it("reports a missing release as stopped", async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(runResult({ code: 1, stderr: "Error: release: not found" }));

    await expect(createDriver(runner).status(PROJECT_ID)).resolves.toBe("stopped");
  });

  it("rejects output that is not a status document", async () => {
    const notJson = vi.fn<CommandRunner>().mockResolvedValue(runResult({ stdout: "STATUS: deployed" }));
    const wrongShape = vi.fn<CommandRunner>().mockResolvedValue(runResult({ stdout: JSON.stringify({ info: {} }) }));

    await expect(createDriver(notJson).status(PROJECT_ID)).rejects.toBeInstanceOf(DeployError);
    await expect(createDriver(wrongShape).status(PROJECT_ID)).rejects.toBeInstanceOf(DeployError);
  });
});
