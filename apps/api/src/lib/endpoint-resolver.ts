import { isIP } from "node:net";
import { ResolveError, errorMessage } from "./errors.js";
import { assertProjectIdentity, assertRfc1123Label, isolationKeyFor } from "./identity.js";
import type { Logger } from "./logger.js";
import { combinedOutput, run, type CommandRunner } from "./sh.js";

export type EndpointName = "preview" | "chat" | "editor";

export type Endpoint = {
  baseAddress: string;
  routePath: string;
  url: string;
};

export type EndpointSet = Record<EndpointName, Endpoint>;

export const ENDPOINT_ROUTE_PATHS: Readonly<Record<EndpointName, string>> = {
  preview: "/preview",
  chat: "/chat",
  editor: "/vscode",
};

export const DEFAULT_FRONT_DOOR_SUFFIX = "dev-session-template-lb";

const RESOLVE_TIMEOUT_MS = 30_000;
const UNSET_ADDRESSES = new Set(["", "<none>", "none"]);

export type ResolveResult =
  | { resolved: true; endpoints: EndpointSet }
  | { resolved: false; endpoints: EndpointSet; failure: ResolveError };

export function buildEndpointSet(
  baseAddress: string,
  routePaths: Readonly<Record<EndpointName, string>> = ENDPOINT_ROUTE_PATHS,
): EndpointSet {
  const host = isIP(baseAddress) === 6 ? `[${baseAddress}]` : baseAddress;
  const endpoint = (name: EndpointName): Endpoint => {
    const routePath = routePaths[name];
    return {
      baseAddress,
      routePath,
      url: baseAddress ? `http://${host}${routePath}` : "",
    };
  };
  return {
    preview: endpoint("preview"),
    chat: endpoint("chat"),
    editor: endpoint("editor"),
  };
}

export interface AddressResolver {
  resolve(projectIdentity: string, workloadName: string): Promise<ResolveResult>;
}

export type EndpointResolverOptions = {
  logger: Logger;
  kubectlBin?: string;
  kubeContext?: string;
  frontDoorSuffix?: string;
  runner?: CommandRunner;
};

/**
 * Looks up the cluster IP of the release's front-door service.
 *
 * Lookup failures are reported as an unresolved result rather than thrown; the
 * caller decides whether an address-less session is acceptable. No retries.
 */
export class EndpointResolver implements AddressResolver {
  readonly #kubectlBin: string;
  readonly #kubeContext: string | undefined;
  readonly #frontDoorSuffix: string;
  readonly #runner: CommandRunner;
  readonly #log: Logger;

  constructor(options: EndpointResolverOptions) {
    this.#kubectlBin = options.kubectlBin || "kubectl";
    this.#kubeContext = options.kubeContext || undefined;
    this.#frontDoorSuffix = assertRfc1123Label(
      options.frontDoorSuffix || DEFAULT_FRONT_DOOR_SUFFIX,
      "front-door service suffix",
    );
    this.#runner = options.runner ?? run;
    this.#log = options.logger.child({ component: "endpoint-resolver" });
  }

  async resolve(projectIdentity: string, workloadName: string): Promise<ResolveResult> {
    const namespace = isolationKeyFor(assertProjectIdentity(projectIdentity));
    const serviceName = `${assertRfc1123Label(workloadName, "workload name")}-${this.#frontDoorSuffix}`;

    const argv = [
      this.#kubectlBin,
      "get",
      "service",
      serviceName,
      "--namespace",
      namespace,
      "--output",
      "jsonpath={.spec.clusterIP}",
    ];
    if (this.#kubeContext) {
      argv.push("--context", this.#kubeContext);
    }

    let failure: ResolveError;
    try {
      const res = await this.#runner(argv, { timeoutMs: RESOLVE_TIMEOUT_MS });
      const address = res.stdout.trim();
      if (res.code !== 0 || res.timedOut) {
        failure = new ResolveError(`kubectl get service ${serviceName} failed`, {
          exitCode: res.code,
          timedOut: res.timedOut,
          output: combinedOutput(res),
        });
      } else if (UNSET_ADDRESSES.has(address.toLowerCase())) {
        failure = new ResolveError(`Service ${serviceName} has no cluster IP yet`);
      } else if (isIP(address) === 0) {
        failure = new ResolveError(`Service ${serviceName} reported an unusable address`, { address });
      } else {
        return { resolved: true, endpoints: buildEndpointSet(address) };
      }
    } catch (error) {
      failure = new ResolveError(`kubectl get service ${serviceName} failed: ${errorMessage(error)}`);
    }

    this.#log.warn({ namespace, service: serviceName, reason: failure.message }, "Front-door address unresolved");
    return { resolved: false, endpoints: buildEndpointSet(""), failure };
  }
}
