import crypto from "node:crypto";
import { buildEndpointSet, type AddressResolver, type EndpointSet } from "./endpoint-resolver.js";
import { DeployError, InvalidIdentityError, NotFoundError, errorMessage } from "./errors.js";
import type { DeploymentDriver } from "./helm-driver.js";
import { isValidProjectIdentity, isolationKeyFor, workloadNameFor } from "./identity.js";
import type { Logger } from "./logger.js";
import type { SessionStatus } from "./session-status.js";
import type {
  NewSessionRecord,
  SessionEvent,
  SessionListFilter,
  SessionPage,
  SessionRecord,
  SessionRepository,
} from "./sessions-store.js";

export const DEFAULT_SESSION_TTL_MS = 365 * 24 * 60 * 60 * 1_000;

export type GetOrCreateResult = {
  session: SessionRecord;
  created: boolean;
};

export type DeleteResult = {
  sessionId: number;
  workloadRemoved: boolean;
};

export type InspectResult = {
  session: SessionRecord;
  liveStatus: SessionStatus;
};

type DeployOutcome = {
  status: SessionStatus;
  endpoints: EndpointSet;
  errorMessage: string | null;
  event: { type: string; message: string; payload: Record<string, unknown> };
};

export type SessionReconcilerOptions = {
  store: SessionRepository;
  driver: DeploymentDriver;
  resolver: AddressResolver;
  logger: Logger;
  sessionTtlMs?: number;
  now?: () => Date;
  generateToken?: () => string;
};

/**
 * Drives one project's dev session toward "deployed" and keeps the persisted
 * record in step with what the driver reported.
 *
 * Calls are synchronous end to end and may block for as long as the driver's
 * timeout. The store's uniqueness on active project identities is the only
 * concurrency control.
 */
export class SessionReconciler {
  readonly #store: SessionRepository;
  readonly #driver: DeploymentDriver;
  readonly #resolver: AddressResolver;
  readonly #log: Logger;
  readonly #sessionTtlMs: number;
  readonly #now: () => Date;
  readonly #generateToken: () => string;

  constructor(options: SessionReconcilerOptions) {
    this.#store = options.store;
    this.#driver = options.driver;
    this.#resolver = options.resolver;
    this.#log = options.logger.child({ component: "session-reconciler" });
    this.#sessionTtlMs = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;
    this.#now = options.now ?? (() => new Date());
    this.#generateToken = options.generateToken ?? (() => crypto.randomUUID());
  }

  /**
   * Returns the active session for the project, creating and deploying it when
   * none exists. An existing record is returned as stored: no redeploy, no
   * endpoint refresh.
   *
   * Deploy failures and malformed identities end up as a persisted `error`
   * record. A concurrent create for the same identity surfaces as
   * `UniqueConstraintError`; callers should re-read.
   */
  async getOrCreate(projectIdentity: string, ownerUserId: number, ownerProjectId: number): Promise<GetOrCreateResult> {
    const existing = this.#store.findActiveByProjectIdentity(projectIdentity);
    if (existing) {
      this.#log.debug({ projectIdentity, sessionId: existing.id }, "Found existing session");
      return { session: existing, created: false };
    }

    this.#log.info({ projectIdentity, ownerUserId, ownerProjectId }, "Creating session for project");
    const draft: NewSessionRecord = {
      projectIdentity,
      ownerUserId,
      ownerProjectId,
      isolationKey: isolationKeyFor(projectIdentity),
      workloadName: workloadNameFor(projectIdentity),
      status: "pending",
      token: this.#generateToken(),
      expiresAt: new Date(this.#now().getTime() + this.#sessionTtlMs).toISOString(),
      endpoints: buildEndpointSet(""),
      errorMessage: null,
    };

    const outcome = await this.#deploy(draft);
    const session = this.#store.insert({
      ...draft,
      status: outcome.status,
      endpoints: outcome.endpoints,
      errorMessage: outcome.errorMessage,
    });

    this.#store.appendEvent(session.id, "session.created", "Session created", {
      projectIdentity,
      workloadName: session.workloadName,
    });
    this.#store.appendEvent(session.id, outcome.event.type, outcome.event.message, outcome.event.payload);
    this.#log.info({ projectIdentity, sessionId: session.id, status: session.status }, "Session created");
    return { session, created: true };
  }

  /**
   * Re-applies the workload for an existing session (upgrade in place) and
   * re-derives its status and endpoints from the outcome.
   */
  async update(projectIdentity: string, ownerProjectId: number, ownerUserId: number): Promise<SessionRecord> {
    const existing = this.#store.findActiveByProjectIdentity(projectIdentity);
    if (!existing) {
      throw new NotFoundError();
    }

    const outcome = await this.#deploy({ ...existing, ownerProjectId, ownerUserId });
    const updated = this.#store.update(existing.id, {
      ownerUserId,
      ownerProjectId,
      status: outcome.status,
      endpoints: outcome.endpoints,
      errorMessage: outcome.errorMessage,
    });
    if (!updated) {
      throw new NotFoundError("Session was deleted during update");
    }

    this.#store.appendEvent(updated.id, "session.updated", "Session configuration re-applied", {
      ownerUserId,
      ownerProjectId,
    });
    this.#store.appendEvent(updated.id, outcome.event.type, outcome.event.message, outcome.event.payload);
    this.#log.info({ projectIdentity, sessionId: updated.id, status: updated.status }, "Session updated");
    return updated;
  }

  /**
   * Tears the workload down, then soft-deletes the record. A failed teardown is
   * logged and recorded but never blocks the delete; the release keeps its
   * deterministic name and can be removed later.
   */
  async delete(sessionId: number): Promise<DeleteResult> {
    const session = this.#store.getActive(sessionId);
    if (!session) {
      throw new NotFoundError();
    }

    let workloadRemoved = false;
    if (session.projectIdentity) {
      try {
        await this.#driver.remove(session.projectIdentity);
        workloadRemoved = true;
      } catch (error) {
        this.#log.error(
          { sessionId, projectIdentity: session.projectIdentity, error: errorMessage(error) },
          "Failed to remove dev session workload; continuing with delete",
        );
        this.#store.appendEvent(sessionId, "session.remove.failed", "Workload removal failed", {
          error: errorMessage(error),
        });
      }
    }

    if (!this.#store.softDelete(sessionId)) {
      throw new NotFoundError();
    }
    this.#store.appendEvent(sessionId, "session.deleted", "Session deleted", { workloadRemoved });
    this.#log.info({ sessionId, projectIdentity: session.projectIdentity, workloadRemoved }, "Session deleted");
    return { sessionId, workloadRemoved };
  }

  get(sessionId: number): SessionRecord {
    const session = this.#store.getActive(sessionId);
    if (!session) {
      throw new NotFoundError();
    }
    return session;
  }

  findByProjectIdentity(projectIdentity: string): SessionRecord | null {
    return this.#store.findActiveByProjectIdentity(projectIdentity);
  }

  /** Samples the release status from the cluster. Nothing is persisted. */
  async inspect(sessionId: number): Promise<InspectResult> {
    const session = this.get(sessionId);
    const liveStatus = await this.#driver.status(session.projectIdentity);
    return { session, liveStatus };
  }

  list(filter: SessionListFilter = {}): SessionPage {
    return this.#store.list(filter);
  }

  listEvents(sessionId: number, limit = 200): SessionEvent[] {
    return this.#store.listEvents(sessionId, limit);
  }

  async #deploy(
    target: Pick<SessionRecord, "projectIdentity" | "ownerProjectId" | "ownerUserId" | "workloadName">,
  ): Promise<DeployOutcome> {
    const unresolved = buildEndpointSet("");
    const { projectIdentity } = target;

    if (!isValidProjectIdentity(projectIdentity)) {
      const error = new InvalidIdentityError("project identity");
      this.#log.warn({ projectIdentity }, "Rejected malformed project identity");
      return {
        status: "error",
        endpoints: unresolved,
        errorMessage: error.message,
        event: { type: "session.deploy.rejected", message: error.message, payload: {} },
      };
    }

    try {
      await this.#driver.apply(projectIdentity, target.ownerProjectId, target.ownerUserId);
    } catch (error) {
      if (!(error instanceof DeployError) && !(error instanceof InvalidIdentityError)) {
        throw error;
      }
      this.#log.error({ projectIdentity, error: error.message }, "Failed to deploy dev session");
      return {
        status: "error",
        endpoints: unresolved,
        errorMessage: error.message,
        event: {
          type: "session.deploy.failed",
          message: "Workload deployment failed",
          payload: { code: error.code, ...(error.details ?? {}) },
        },
      };
    }

    const resolution = await this.#resolver.resolve(projectIdentity, target.workloadName);
    if (!resolution.resolved) {
      return {
        status: "running",
        endpoints: resolution.endpoints,
        errorMessage: null,
        event: {
          type: "session.endpoints.unresolved",
          message: "Workload deployed; front-door address not available yet",
          payload: { reason: resolution.failure.message },
        },
      };
    }

    return {
      status: "running",
      endpoints: resolution.endpoints,
      errorMessage: null,
      event: {
        type: "session.deploy.succeeded",
        message: "Workload deployed",
        payload: { baseAddress: resolution.endpoints.preview.baseAddress },
      },
    };
  }
}
