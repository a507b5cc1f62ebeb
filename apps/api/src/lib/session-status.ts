export const SESSION_STATUSES = ["pending", "running", "stopped", "error"] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

const RELEASE_STATUS_MAP: ReadonlyMap<string, SessionStatus> = new Map([
  ["deployed", "running"],
  ["succeeded", "running"],
  ["pending-install", "pending"],
  ["pending-upgrade", "pending"],
  ["pending-rollback", "pending"],
  ["installing", "pending"],
  ["upgrading", "pending"],
  ["failed", "error"],
  ["uninstalling", "stopped"],
  ["uninstalled", "stopped"],
]);

/**
 * Maps a Helm release status onto the session status.
 *
 * Any `pending-*` status is in flight. Unrecognised values map to `error` so a release in an unknown state is never
 * presented as `running`.
 */
export function translateReleaseStatus(raw: string): SessionStatus {
  const normalized = raw.trim().toLowerCase();
  const mapped = RELEASE_STATUS_MAP.get(normalized);
  if (mapped) return mapped;
  if (normalized.startsWith("pending-")) return "pending";
  return "error";
}

export function isSessionStatus(value: unknown): value is SessionStatus {
  return typeof value === "string" && SESSION_STATUSES.some((status) => status === value);
}
