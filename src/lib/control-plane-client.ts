export type SessionStatus = "pending" | "running" | "stopped" | "error";

export type RemoteEndpoint = {
  baseAddress: string;
  routePath: string;
  url: string;
};

export type RemoteSession = {
  id: number;
  projectIdentity: string;
  ownerUserId: number;
  ownerProjectId: number;
  isolationKey: string;
  workloadName: string;
  status: SessionStatus;
  expiresAt: string;
  endpoints: Record<"preview" | "chat" | "editor", RemoteEndpoint>;
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
};

export type RemoteSessionEvent = {
  id: number;
  type: string;
  message: string;
  payload: Record<string, unknown>;
  createdAt: string;
};

export type SessionListResponse = {
  sessions: RemoteSession[];
  pagination: { page: number; pageSize: number; total: number; totalPages: number };
};

export type SessionListQuery = {
  userId?: number;
  projectId?: number;
  status?: SessionStatus;
  page?: number;
  pageSize?: number;
};

export type OwnerIds = {
  userId: number;
  projectId: number;
};

export class ControlPlaneError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "ControlPlaneError";
    this.statusCode = statusCode;
    this.details = details;
  }
}

type ErrorEnvelope = { ok?: boolean; error?: string; details?: unknown };

function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  return typeof value === "object" && value !== null && "error" in value;
}

export class ControlPlaneClient {
  readonly #baseUrl: string;

  constructor(baseUrl: string) {
    const trimmed = String(baseUrl || "").trim().replace(/\/+$/, "");
    if (!trimmed) {
      throw new Error("Missing control plane API URL");
    }
    this.#baseUrl = trimmed;
  }

  async #request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const res = await fetch(`${this.#baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    const text = await res.text();
    let data: unknown = null;
    if (text) {
      try {
        data = JSON.parse(text);
      } catch {
        data = text;
      }
    }

    if (!res.ok) {
      const message = isErrorEnvelope(data) && data.error ? data.error : `Control plane error (${res.status})`;
      throw new ControlPlaneError(message, res.status, isErrorEnvelope(data) ? data.details : data);
    }

    return data as T;
  }

  async openSession(projectIdentity: string, owner: OwnerIds) {
    const query = new URLSearchParams({ user_id: String(owner.userId), project_id: String(owner.projectId) });
    const res = await this.#request<{ session: RemoteSession }>(
      "GET",
      `/v1/sessions/project/${encodeURIComponent(projectIdentity)}?${query.toString()}`,
    );
    return res.session;
  }

  async refreshSession(projectIdentity: string, owner: OwnerIds) {
    const res = await this.#request<{ session: RemoteSession }>(
      "PUT",
      `/v1/sessions/project/${encodeURIComponent(projectIdentity)}`,
      { ownerUserId: owner.userId, ownerProjectId: owner.projectId },
    );
    return res.session;
  }

  async listSessions(filter: SessionListQuery = {}) {
    const query = new URLSearchParams();
    if (filter.userId !== undefined) query.set("user_id", String(filter.userId));
    if (filter.projectId !== undefined) query.set("project_id", String(filter.projectId));
    if (filter.status) query.set("status", filter.status);
    if (filter.page !== undefined) query.set("page", String(filter.page));
    if (filter.pageSize !== undefined) query.set("page_size", String(filter.pageSize));
    const encoded = query.toString();
    const suffix = encoded ? `?${encoded}` : "";
    const res = await this.#request<SessionListResponse>("GET", `/v1/sessions${suffix}`);
    return { sessions: res.sessions, pagination: res.pagination };
  }

  async getSession(id: number) {
    return await this.#request<{ session: RemoteSession; events: RemoteSessionEvent[] }>("GET", `/v1/sessions/${id}`);
  }

  async getSessionStatus(id: number) {
    return await this.#request<{ sessionId: number; storedStatus: SessionStatus; liveStatus: SessionStatus }>(
      "GET",
      `/v1/sessions/${id}/status`,
    );
  }

  async deleteSession(id: number) {
    await this.#request<null>("DELETE", `/v1/sessions/${id}`);
  }
}
