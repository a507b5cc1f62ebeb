import { z } from "zod";
import { DeployError } from "./errors.js";
import { assertOwnerId, assertProjectIdentity, isolationKeyFor, workloadNameFor } from "./identity.js";
import type { Logger } from "./logger.js";
import { translateReleaseStatus, type SessionStatus } from "./session-status.js";
import { combinedOutput, run, type CommandRunner, type RunResult } from "./sh.js";

export const DEFAULT_DEPLOY_TIMEOUT_MS = 5 * 60_000;

// Helm enforces its own --timeout; the process is killed only if it hangs past it.
const PROCESS_GRACE_MS = 30_000;

const RELEASE_NOT_FOUND = /release:? not found/i;

const helmStatusSchema = z.object({
  info: z.object({
    status: z.string(),
  }),
});

export interface DeploymentDriver {
  apply(projectIdentity: string, ownerProjectId: number, ownerUserId: number): Promise<void>;
  remove(projectIdentity: string): Promise<void>;
  status(projectIdentity: string): Promise<SessionStatus>;
}

export type HelmDriverOptions = {
  chartPath: string;
  logger: Logger;
  helmBin?: string;
  timeoutMs?: number;
  kubeContext?: string;
  runner?: CommandRunner;
};

export class HelmDriver implements DeploymentDriver {
  readonly #chartPath: string;
  readonly #helmBin: string;
  readonly #timeoutMs: number;
  readonly #kubeContext: string | undefined;
  readonly #runner: CommandRunner;
  readonly #log: Logger;

  constructor(options: HelmDriverOptions) {
    if (!options.chartPath) {
      throw new Error("HelmDriver requires a chart path");
    }
    this.#chartPath = options.chartPath;
    this.#helmBin = options.helmBin || "helm";
    this.#timeoutMs = Math.max(1_000, options.timeoutMs ?? DEFAULT_DEPLOY_TIMEOUT_MS);
    this.#kubeContext = options.kubeContext || undefined;
    this.#runner = options.runner ?? run;
    this.#log = options.logger.child({ component: "helm-driver" });
  }

  async apply(projectIdentity: string, ownerProjectId: number, ownerUserId: number): Promise<void> {
    const identity = assertProjectIdentity(projectIdentity);
    const projectId = assertOwnerId(ownerProjectId, "owner project id");
    const userId = assertOwnerId(ownerUserId, "owner user id");
    const release = workloadNameFor(identity);
    const namespace = isolationKeyFor(identity);

    this.#log.info({ release, namespace, projectId, userId }, "Applying dev session release");
    const res = await this.#helm([
      "upgrade",
      "--install",
      release,
      this.#chartPath,
      "--namespace",
      namespace,
      "--create-namespace",
      "--set",
      `project.uuid=${identity}`,
      "--set",
      `project.id=${projectId}`,
      "--set",
      `user.id=${userId}`,
      "--wait",
      "--timeout",
      this.#helmTimeout(),
    ]);

    if (res.code !== 0 || res.timedOut) {
      const error = new DeployError("helm upgrade --install", {
        output: combinedOutput(res),
        exitCode: res.timedOut ? null : res.code,
        timedOut: res.timedOut,
      });
      this.#log.error({ release, namespace, exitCode: error.exitCode, timedOut: error.timedOut, output: error.output }, "Helm apply failed");
      throw error;
    }

    this.#log.info({ release, namespace }, "Dev session release applied");
  }

  async remove(projectIdentity: string): Promise<void> {
    const identity = assertProjectIdentity(projectIdentity);
    const release = workloadNameFor(identity);
    const namespace = isolationKeyFor(identity);

    this.#log.info({ release, namespace }, "Removing dev session release");
    const res = await this.#helm([
      "uninstall",
      release,
      "--namespace",
      namespace,
      "--wait",
      "--timeout",
      this.#helmTimeout(),
    ]);

    if (res.code !== 0 || res.timedOut) {
      const output = combinedOutput(res);
      if (!res.timedOut && RELEASE_NOT_FOUND.test(output)) {
        this.#log.info({ release, namespace }, "Release already absent");
        return;
      }
      const error = new DeployError("helm uninstall", {
        output,
        exitCode: res.timedOut ? null : res.code,
        timedOut: res.timedOut,
      });
      this.#log.error({ release, namespace, exitCode: error.exitCode, timedOut: error.timedOut, output }, "Helm uninstall failed");
      throw error;
    }

    this.#log.info({ release, namespace }, "Dev session release removed");
  }

  async status(projectIdentity: string): Promise<SessionStatus> {
    const identity = assertProjectIdentity(projectIdentity);
    const release = workloadNameFor(identity);
    const namespace = isolationKeyFor(identity);

    const res = await this.#helm(["status", release, "--namespace", namespace, "--output", "json"]);
    if (res.code !== 0 || res.timedOut) {
      const output = combinedOutput(res);
      if (!res.timedOut && RELEASE_NOT_FOUND.test(output)) {
        return "stopped";
      }
      throw new DeployError("helm status", {
        output,
        exitCode: res.timedOut ? null : res.code,
        timedOut: res.timedOut,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(res.stdout);
    } catch (error) {
      throw new DeployError("helm status", { output: res.stdout, exitCode: res.code, cause: error });
    }

    const parsed = helmStatusSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DeployError("helm status", {
        output: `unexpected status payload: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
        exitCode: res.code,
      });
    }
    return translateReleaseStatus(parsed.data.info.status);
  }

  #helmTimeout(): string {
    return `${Math.ceil(this.#timeoutMs / 1_000)}s`;
  }

  async #helm(args: string[]): Promise<RunResult> {
    const argv = [this.#helmBin, ...args];
    if (this.#kubeContext) {
      argv.push("--kube-context", this.#kubeContext);
    }
    return await this.#runner(argv, { timeoutMs: this.#timeoutMs + PROCESS_GRACE_MS });
  }
}
