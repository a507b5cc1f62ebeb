import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { z } from "zod";
import { SessionServiceError, UniqueConstraintError } from "./lib/errors.js";
import type { Logger } from "./lib/logger.js";
import type { GetOrCreateResult, SessionReconciler } from "./lib/session-reconciler.js";
import { SESSION_STATUSES } from "./lib/session-status.js";

export type AppOptions = {
  reconciler: SessionReconciler;
  logger: Logger;
  webOrigin?: string;
  issues?: string[];
};

function jsonError(c: Context, status: ContentfulStatusCode, message: string, details?: unknown) {
  return c.json(
    {
      ok: false,
      error: message,
      ...(details !== undefined ? { details } : {}),
    },
    status,
  );
}

const ownerIdSchema = z.number().int().nonnegative();
const ownerIdQuerySchema = z.coerce.number().int().nonnegative();

const sessionIdSchema = z.coerce.number().int().positive();

const getOrCreateQuerySchema = z.object({
  user_id: ownerIdQuerySchema.default(0),
  project_id: ownerIdQuerySchema.default(0),
});

const sessionCreateSchema = z.object({
  projectIdentity: z.string().trim().min(1),
  ownerUserId: ownerIdSchema.default(0),
  ownerProjectId: ownerIdSchema.default(0),
});

const sessionUpdateSchema = z.object({
  ownerUserId: ownerIdSchema,
  ownerProjectId: ownerIdSchema,
});

const listQuerySchema = z.object({
  user_id: ownerIdQuerySchema.optional(),
  project_id: ownerIdQuerySchema.optional(),
  status: z.enum(SESSION_STATUSES).optional(),
  page: z.coerce.number().int().optional(),
  page_size: z.coerce.number().int().optional(),
});

export function createApp(options: AppOptions) {
  const { reconciler } = options;
  const log = options.logger.child({ component: "http" });
  const app = new Hono();

  app.onError((error, c) => {
    if (error instanceof SessionServiceError) {
      return jsonError(c, error.statusCode, error.message, error.details);
    }
    log.error({ err: error, method: c.req.method, path: c.req.path }, "Unhandled API error");
    return jsonError(c, 500, "Internal server error");
  });

  app.notFound((c) => jsonError(c, 404, "Not found"));

  app.use("*", async (c, next) => {
    const started = Date.now();
    await next();
    log.info(
      { method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - started },
      "Request completed",
    );
  });

  app.use(
    "*",
    cors({
      origin: options.webOrigin || "http://localhost:5173",
      allowHeaders: ["content-type"],
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      maxAge: 600,
    }),
  );

  // Another request inserted the same identity first; its record is the answer.
  async function getOrCreate(projectIdentity: string, ownerUserId: number, ownerProjectId: number): Promise<GetOrCreateResult> {
    try {
      return await reconciler.getOrCreate(projectIdentity, ownerUserId, ownerProjectId);
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        const session = reconciler.findByProjectIdentity(projectIdentity);
        if (session) {
          log.info({ projectIdentity, sessionId: session.id }, "Concurrent create detected; returning winner");
          return { session, created: false };
        }
      }
      throw error;
    }
  }

  app.get("/health", (c) => c.json({ ok: true, issues: options.issues ?? [] }));

  app.get("/v1/sessions/project/:projectIdentity", async (c) => {
    const parsed = getOrCreateQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return jsonError(c, 400, "Invalid query", parsed.error.flatten());
    }
    const { session } = await getOrCreate(c.req.param("projectIdentity"), parsed.data.user_id, parsed.data.project_id);
    return c.json({ ok: true, session });
  });

  app.put("/v1/sessions/project/:projectIdentity", async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = sessionUpdateSchema.safeParse(body);
    if (!parsed.success) {
      return jsonError(c, 400, "Invalid body", parsed.error.flatten());
    }
    const session = await reconciler.update(
      c.req.param("projectIdentity"),
      parsed.data.ownerProjectId,
      parsed.data.ownerUserId,
    );
    return c.json({ ok: true, session });
  });

  app.post("/v1/sessions", async (c) => {
    const body = await c.req.json().catch(() => null);
    const parsed = sessionCreateSchema.safeParse(body);
    if (!parsed.success) {
      return jsonError(c, 400, "Invalid body", parsed.error.flatten());
    }
    const { session, created } = await getOrCreate(
      parsed.data.projectIdentity,
      parsed.data.ownerUserId,
      parsed.data.ownerProjectId,
    );
    return c.json({ ok: true, session }, created ? 201 : 200);
  });

  app.get("/v1/sessions", (c) => {
    const parsed = listQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return jsonError(c, 400, "Invalid query", parsed.error.flatten());
    }
    const page = reconciler.list({
      ownerUserId: parsed.data.user_id,
      ownerProjectId: parsed.data.project_id,
      status: parsed.data.status,
      page: parsed.data.page,
      pageSize: parsed.data.page_size,
    });
    return c.json({ ok: true, ...page });
  });

  app.get("/v1/sessions/:id", (c) => {
    const id = sessionIdSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return jsonError(c, 400, "Invalid session ID");
    }
    const session = reconciler.get(id.data);
    return c.json({ ok: true, session, events: reconciler.listEvents(id.data) });
  });

  app.get("/v1/sessions/:id/status", async (c) => {
    const id = sessionIdSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return jsonError(c, 400, "Invalid session ID");
    }
    const { session, liveStatus } = await reconciler.inspect(id.data);
    return c.json({ ok: true, sessionId: session.id, storedStatus: session.status, liveStatus });
  });

  app.delete("/v1/sessions/:id", async (c) => {
    const id = sessionIdSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return jsonError(c, 400, "Invalid session ID");
    }
    await reconciler.delete(id.data);
    return c.body(null, 204);
  });

  return app;
}
