import path from "node:path";
import { DEFAULT_FRONT_DOOR_SUFFIX } from "./endpoint-resolver.js";
import { DEFAULT_DEPLOY_TIMEOUT_MS } from "./helm-driver.js";
import { isRfc1123Label } from "./identity.js";
import type { LogLevel } from "./logger.js";

export type ApiConfig = {
  port: number;
  sessionsDbPath: string;
  helmBin: string;
  kubectlBin: string;
  helmChartPath: string;
  kubeContext: string | undefined;
  frontDoorSuffix: string;
  deployTimeoutMs: number;
  sessionTtlDays: number;
  logLevel: LogLevel;
  webOrigin: string;
  issues: string[];
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parsePositiveInt(raw: string | undefined, fallback: number, name: string, issues: string[]): number {
  if (!raw || !raw.trim()) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    issues.push(`${name} must be a positive integer (got "${raw}"); using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Reads the API configuration from the environment. Bad values fall back to
 * their defaults and are reported in `issues`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const issues: string[] = [];

  const rawLogLevel = (env.LOG_LEVEL || "info").trim().toLowerCase();
  let logLevel: LogLevel = "info";
  if (isLogLevel(rawLogLevel)) {
    logLevel = rawLogLevel;
  } else {
    issues.push(`Unsupported LOG_LEVEL "${rawLogLevel}"; using info`);
  }

  let frontDoorSuffix = (env.FRONT_DOOR_SERVICE_SUFFIX || DEFAULT_FRONT_DOOR_SUFFIX).trim();
  if (!isRfc1123Label(frontDoorSuffix)) {
    issues.push(`FRONT_DOOR_SERVICE_SUFFIX "${frontDoorSuffix}" is not a DNS label; using ${DEFAULT_FRONT_DOOR_SUFFIX}`);
    frontDoorSuffix = DEFAULT_FRONT_DOOR_SUFFIX;
  }

  return {
    port: parsePositiveInt(env.PORT, 8080, "PORT", issues),
    sessionsDbPath: env.SESSIONS_DB_PATH || path.join(process.cwd(), ".devsession", "sessions.db"),
    helmBin: env.HELM_BIN || "helm",
    kubectlBin: env.KUBECTL_BIN || "kubectl",
    helmChartPath: env.HELM_CHART_PATH || "./helm/dev-session-template",
    kubeContext: env.KUBE_CONTEXT?.trim() || undefined,
    frontDoorSuffix,
    deployTimeoutMs: parsePositiveInt(env.DEPLOY_TIMEOUT_MS, DEFAULT_DEPLOY_TIMEOUT_MS, "DEPLOY_TIMEOUT_MS", issues),
    sessionTtlDays: parsePositiveInt(env.SESSION_TTL_DAYS, 365, "SESSION_TTL_DAYS", issues),
    logLevel,
    webOrigin: env.WEB_ORIGIN || "http://localhost:5173",
    issues,
  };
}
