import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { buildEndpointSet, type EndpointSet } from "./endpoint-resolver.js";
import { UniqueConstraintError } from "./errors.js";
import type { SessionStatus } from "./session-status.js";

export type SessionRecord = {
  id: number;
  projectIdentity: string;
  ownerUserId: number;
  ownerProjectId: number;
  isolationKey: string;
  workloadName: string;
  status: SessionStatus;
  token: string;
  expiresAt: string;
  endpoints: EndpointSet;
  errorMessage: string | null;
  active: boolean;
  createdAt: string;
  updatedAt: string;
  deletedAt: string | null;
};

export type NewSessionRecord = Omit<SessionRecord, "id" | "active" | "createdAt" | "updatedAt" | "deletedAt">;

export type SessionPatch = Partial<
  Pick<SessionRecord, "ownerUserId" | "ownerProjectId" | "status" | "endpoints" | "errorMessage">
>;

export type SessionListFilter = {
  ownerUserId?: number;
  ownerProjectId?: number;
  status?: SessionStatus;
  page?: number;
  pageSize?: number;
};

export type SessionPage = {
  sessions: SessionRecord[];
  pagination: {
    page: number;
    pageSize: number;
    total: number;
    totalPages: number;
  };
};

export type SessionEvent = {
  id: number;
  sessionId: number;
  type: string;
  message: string;
  payload: Record<string, unknown>;
  createdAt: string;
};

/** What the reconciler needs from persistence. */
export interface SessionRepository {
  findActiveByProjectIdentity(projectIdentity: string): SessionRecord | null;
  getActive(id: number): SessionRecord | null;
  /** @throws UniqueConstraintError when an active record already holds the identity. */
  insert(record: NewSessionRecord): SessionRecord;
  update(id: number, patch: SessionPatch): SessionRecord | null;
  softDelete(id: number): boolean;
  list(filter?: SessionListFilter): SessionPage;
  appendEvent(sessionId: number, type: string, message: string, payload?: Record<string, unknown>): SessionEvent;
  listEvents(sessionId: number, limit?: number): SessionEvent[];
}

type SessionRow = {
  id: number;
  project_identity: string;
  owner_user_id: number;
  owner_project_id: number;
  isolation_key: string;
  workload_name: string;
  status: SessionStatus;
  token: string;
  expires_at: string;
  base_address: string;
  preview_path: string;
  chat_path: string;
  editor_path: string;
  error_message: string | null;
  active: number;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
};

type SessionEventRow = {
  id: number;
  session_id: number;
  type: string;
  message: string;
  payload_json: string | null;
  created_at: string;
};

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

const ACTIVE_IDENTITY_CONFLICT = /sessions\.project_identity|idx_sessions_active_project_identity/i;

function nowIso() {
  return new Date().toISOString();
}

function parseJson<T>(value: string | null | undefined, fallback: T): T {
  if (!value) return fallback;
  try {
    return JSON.parse(value) as T;
  } catch {
    return fallback;
  }
}

function hasOwn(o: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(o, key);
}

function isActiveIdentityConflict(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    error.code.startsWith("SQLITE_CONSTRAINT") &&
    ACTIVE_IDENTITY_CONFLICT.test(error.message)
  );
}

export function isExpired(record: Pick<SessionRecord, "expiresAt">, now = new Date()): boolean {
  return now.getTime() > Date.parse(record.expiresAt);
}

export class SessionsStore implements SessionRepository {
  readonly #db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.#db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.#db = new Database(absolutePath);
      this.#db.pragma("journal_mode = WAL");
    }
    this.#db.pragma("foreign_keys = ON");
    this.#init();
  }

  #init() {
    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        project_identity TEXT NOT NULL,
        owner_user_id INTEGER NOT NULL,
        owner_project_id INTEGER NOT NULL,
        isolation_key TEXT NOT NULL,
        workload_name TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending','running','stopped','error')),
        token TEXT NOT NULL UNIQUE,
        expires_at TEXT NOT NULL,
        base_address TEXT NOT NULL DEFAULT '',
        preview_path TEXT NOT NULL,
        chat_path TEXT NOT NULL,
        editor_path TEXT NOT NULL,
        error_message TEXT NULL,
        active INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        deleted_at TEXT NULL
      );

      CREATE TABLE IF NOT EXISTS session_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id INTEGER NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        type TEXT NOT NULL,
        message TEXT NOT NULL,
        payload_json TEXT NULL,
        created_at TEXT NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_sessions_active_project_identity
        ON sessions(project_identity) WHERE active = 1;
      CREATE INDEX IF NOT EXISTS idx_sessions_owner_user_id ON sessions(owner_user_id);
      CREATE INDEX IF NOT EXISTS idx_sessions_owner_project_id ON sessions(owner_project_id);
      CREATE INDEX IF NOT EXISTS idx_sessions_status ON sessions(status, created_at);
      CREATE INDEX IF NOT EXISTS idx_session_events_session ON session_events(session_id, id DESC);
    `);
  }

  close() {
    this.#db.close();
  }

  #toRecord(row: SessionRow): SessionRecord {
    return {
      id: row.id,
      projectIdentity: row.project_identity,
      ownerUserId: row.owner_user_id,
      ownerProjectId: row.owner_project_id,
      isolationKey: row.isolation_key,
      workloadName: row.workload_name,
      status: row.status,
      token: row.token,
      expiresAt: row.expires_at,
      endpoints: buildEndpointSet(row.base_address, {
        preview: row.preview_path,
        chat: row.chat_path,
        editor: row.editor_path,
      }),
      errorMessage: row.error_message,
      active: row.active === 1,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      deletedAt: row.deleted_at,
    };
  }

  #getActiveRow(id: number): SessionRow | null {
    return (
      (this.#db
        .prepare(
          `
      SELECT * FROM sessions WHERE id = ? AND active = 1
    `,
        )
        .get(id) as SessionRow | undefined) ?? null
    );
  }

  findActiveByProjectIdentity(projectIdentity: string): SessionRecord | null {
    const row = this.#db
      .prepare(
        `
      SELECT * FROM sessions WHERE project_identity = ? AND active = 1
    `,
      )
      .get(projectIdentity) as SessionRow | undefined;
    return row ? this.#toRecord(row) : null;
  }

  getActive(id: number): SessionRecord | null {
    const row = this.#getActiveRow(id);
    return row ? this.#toRecord(row) : null;
  }

  insert(record: NewSessionRecord): SessionRecord {
    const createdAt = nowIso();
    let row: SessionRow | undefined;
    try {
      row = this.#db
        .prepare(
          `
        INSERT INTO sessions (
          project_identity, owner_user_id, owner_project_id, isolation_key, workload_name,
          status, token, expires_at, base_address, preview_path, chat_path, editor_path,
          error_message, active, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)
        RETURNING *
      `,
        )
        .get(
          record.projectIdentity,
          record.ownerUserId,
          record.ownerProjectId,
          record.isolationKey,
          record.workloadName,
          record.status,
          record.token,
          record.expiresAt,
          record.endpoints.preview.baseAddress,
          record.endpoints.preview.routePath,
          record.endpoints.chat.routePath,
          record.endpoints.editor.routePath,
          record.errorMessage,
          createdAt,
          createdAt,
        ) as SessionRow | undefined;
    } catch (error) {
      if (isActiveIdentityConflict(error)) {
        throw new UniqueConstraintError(record.projectIdentity, error);
      }
      throw error;
    }

    if (!row) {
      throw new Error("Failed to read session after insert");
    }
    return this.#toRecord(row);
  }

  update(id: number, patch: SessionPatch): SessionRecord | null {
    const current = this.#getActiveRow(id);
    if (!current) return null;

    const nextOwnerUserId = hasOwn(patch, "ownerUserId") ? patch.ownerUserId ?? current.owner_user_id : current.owner_user_id;
    const nextOwnerProjectId = hasOwn(patch, "ownerProjectId")
      ? patch.ownerProjectId ?? current.owner_project_id
      : current.owner_project_id;
    const nextStatus = hasOwn(patch, "status") ? patch.status ?? current.status : current.status;
    const nextEndpoints = hasOwn(patch, "endpoints") ? patch.endpoints : undefined;
    const nextErrorMessage = hasOwn(patch, "errorMessage") ? patch.errorMessage ?? null : current.error_message;

    const row = this.#db
      .prepare(
        `
      UPDATE sessions
      SET
        owner_user_id = ?,
        owner_project_id = ?,
        status = ?,
        base_address = ?,
        preview_path = ?,
        chat_path = ?,
        editor_path = ?,
        error_message = ?,
        updated_at = ?
      WHERE id = ? AND active = 1
      RETURNING *
    `,
      )
      .get(
        nextOwnerUserId,
        nextOwnerProjectId,
        nextStatus,
        nextEndpoints ? nextEndpoints.preview.baseAddress : current.base_address,
        nextEndpoints ? nextEndpoints.preview.routePath : current.preview_path,
        nextEndpoints ? nextEndpoints.chat.routePath : current.chat_path,
        nextEndpoints ? nextEndpoints.editor.routePath : current.editor_path,
        nextErrorMessage,
        nowIso(),
        id,
      ) as SessionRow | undefined;

    return row ? this.#toRecord(row) : null;
  }

  softDelete(id: number): boolean {
    const deletedAt = nowIso();
    const result = this.#db
      .prepare(
        `
      UPDATE sessions
      SET active = 0, deleted_at = ?, updated_at = ?
      WHERE id = ? AND active = 1
    `,
      )
      .run(deletedAt, deletedAt, id);
    return result.changes > 0;
  }

  list(filter: SessionListFilter = {}): SessionPage {
    const page = Math.max(1, Math.trunc(filter.page ?? 1));
    const requestedPageSize = Math.trunc(filter.pageSize ?? DEFAULT_PAGE_SIZE);
    const pageSize = requestedPageSize >= 1 && requestedPageSize <= MAX_PAGE_SIZE ? requestedPageSize : DEFAULT_PAGE_SIZE;

    const clauses = ["active = 1"];
    const params: Array<string | number> = [];
    if (filter.ownerUserId !== undefined) {
      clauses.push("owner_user_id = ?");
      params.push(filter.ownerUserId);
    }
    if (filter.ownerProjectId !== undefined) {
      clauses.push("owner_project_id = ?");
      params.push(filter.ownerProjectId);
    }
    if (filter.status !== undefined) {
      clauses.push("status = ?");
      params.push(filter.status);
    }
    const where = clauses.join(" AND ");

    const { total } = this.#db.prepare(`SELECT COUNT(*) AS total FROM sessions WHERE ${where}`).get(...params) as {
      total: number;
    };
    const rows = this.#db
      .prepare(
        `
      SELECT * FROM sessions
      WHERE ${where}
      ORDER BY id ASC
      LIMIT ? OFFSET ?
    `,
      )
      .all(...params, pageSize, (page - 1) * pageSize) as SessionRow[];

    return {
      sessions: rows.map((row) => this.#toRecord(row)),
      pagination: {
        page,
        pageSize,
        total,
        totalPages: Math.ceil(total / pageSize),
      },
    };
  }

  appendEvent(
    sessionId: number,
    type: string,
    message: string,
    payload?: Record<string, unknown>,
  ): SessionEvent {
    const createdAt = nowIso();
    const result = this.#db
      .prepare(
        `
      INSERT INTO session_events (
        session_id, type, message, payload_json, created_at
      ) VALUES (?, ?, ?, ?, ?)
    `,
      )
      .run(sessionId, type, message, payload ? JSON.stringify(payload) : null, createdAt);

    return {
      id: Number(result.lastInsertRowid),
      sessionId,
      type,
      message,
      payload: payload ?? {},
      createdAt,
    };
  }

  listEvents(sessionId: number, limit = 200): SessionEvent[] {
    const rows = this.#db
      .prepare(
        `
      SELECT id, session_id, type, message, payload_json, created_at
      FROM session_events
      WHERE session_id = ?
      ORDER BY id DESC
      LIMIT ?
    `,
      )
      .all(sessionId, limit) as SessionEventRow[];
    return rows.map((row) => ({
      id: row.id,
      sessionId: row.session_id,
      type: row.type,
      message: row.message,
      payload: parseJson<Record<string, unknown>>(row.payload_json, {}),
      createdAt: row.created_at,
    }));
  }
}
