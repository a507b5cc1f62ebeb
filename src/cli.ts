#!/usr/bin/env node
import { Command } from "commander";
import { ControlPlaneClient, ControlPlaneError, type SessionStatus } from "./lib/control-plane-client.js";

const program = new Command();
program
  .name("devsess")
  .description("Open, inspect and tear down project dev sessions")
  .option(
    "--api-url <url>",
    "Dev session control plane URL",
    process.env.DEVSESSION_API_URL || "http://localhost:8080",
  );

const ALLOWED_STATUSES: readonly SessionStatus[] = ["pending", "running", "stopped", "error"];

function isSessionStatus(value: string): value is SessionStatus {
  return ALLOWED_STATUSES.some((status) => status === value);
}

function parseNonNegativeInt(value: unknown, label: string): number {
  const raw = String(value ?? "").trim();
  if (!/^[0-9]+$/.test(raw)) {
    throw new Error(`${label} must be a non-negative integer`);
  }
  return Number.parseInt(raw, 10);
}

function parseSessionId(value: unknown): number {
  const id = parseNonNegativeInt(value, "<id>");
  if (id === 0) {
    throw new Error("<id> must be a positive integer");
  }
  return id;
}

function client(): ControlPlaneClient {
  const opts = program.opts<{ apiUrl: string }>();
  return new ControlPlaneClient(opts.apiUrl);
}

function print(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

program
  .command("session:open")
  .description("Get or create the dev session for a project")
  .argument("<projectIdentity>", "Project UUID")
  .option("--user-id <id>", "Owning user id", "0")
  .option("--project-id <id>", "Owning project id", "0")
  .action(async (projectIdentity: string, opts: { userId: string; projectId: string }) => {
    const session = await client().openSession(projectIdentity, {
      userId: parseNonNegativeInt(opts.userId, "--user-id"),
      projectId: parseNonNegativeInt(opts.projectId, "--project-id"),
    });
    print({ ok: true, session });
  });

program
  .command("session:refresh")
  .description("Re-apply the workload of an existing session")
  .argument("<projectIdentity>", "Project UUID")
  .requiredOption("--user-id <id>", "Owning user id")
  .requiredOption("--project-id <id>", "Owning project id")
  .action(async (projectIdentity: string, opts: { userId: string; projectId: string }) => {
    const session = await client().refreshSession(projectIdentity, {
      userId: parseNonNegativeInt(opts.userId, "--user-id"),
      projectId: parseNonNegativeInt(opts.projectId, "--project-id"),
    });
    print({ ok: true, session });
  });

program
  .command("session:list")
  .description("List active sessions")
  .option("--user-id <id>", "Filter by owning user id")
  .option("--project-id <id>", "Filter by owning project id")
  .option("--status <status>", "Filter by status (pending|running|stopped|error)")
  .option("--page <n>", "Page number", "1")
  .option("--page-size <n>", "Page size (1-100)", "10")
  .action(
    async (opts: { userId?: string; projectId?: string; status?: string; page: string; pageSize: string }) => {
      const status = opts.status?.trim().toLowerCase();
      if (status !== undefined && !isSessionStatus(status)) {
        throw new Error(`Invalid --status. Expected one of: ${ALLOWED_STATUSES.join(", ")}`);
      }
      const res = await client().listSessions({
        userId: opts.userId !== undefined ? parseNonNegativeInt(opts.userId, "--user-id") : undefined,
        projectId: opts.projectId !== undefined ? parseNonNegativeInt(opts.projectId, "--project-id") : undefined,
        status,
        page: parseNonNegativeInt(opts.page, "--page"),
        pageSize: parseNonNegativeInt(opts.pageSize, "--page-size"),
      });
      print({ ok: true, ...res });
    },
  );

program
  .command("session:show")
  .description("Show a session and its recent events")
  .argument("<id>", "Session id")
  .action(async (id: string) => {
    const res = await client().getSession(parseSessionId(id));
    print({ ok: true, ...res });
  });

program
  .command("session:status")
  .description("Sample the live release status of a session")
  .argument("<id>", "Session id")
  .action(async (id: string) => {
    const res = await client().getSessionStatus(parseSessionId(id));
    print({ ok: true, ...res });
  });

program
  .command("session:delete")
  .description("Tear down a session's workload and delete the session")
  .argument("<id>", "Session id")
  .action(async (id: string) => {
    const sessionId = parseSessionId(id);
    await client().deleteSession(sessionId);
    print({ ok: true, deleted: sessionId });
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof ControlPlaneError) {
    print({ ok: false, status: error.statusCode, error: error.message, details: error.details });
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
}
