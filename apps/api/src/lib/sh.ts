import { spawn } from "node:child_process";

export type RunResult = {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type RunOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  // SIGTERM after this long, SIGKILL if it is still alive 5s later.
  timeoutMs?: number;
};

export type CommandRunner = (argv: string[], opts?: RunOptions) => Promise<RunResult>;

const KILL_GRACE_MS = 5_000;

export async function run(argv: string[], opts?: RunOptions): Promise<RunResult> {
  return await new Promise((resolve) => {
    let settled = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | null = null;
    let killTimer: NodeJS.Timeout | null = null;

    const finish = (result: Omit<RunResult, "timedOut">) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      resolve({ ...result, timedOut });
    };

    const [command, ...args] = argv;
    if (!command) {
      finish({ code: 1, stdout: "", stderr: "empty argv" });
      return;
    }

    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      cwd: opts?.cwd,
      env: { ...process.env, ...(opts?.env ?? {}) },
    });

    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => (stdout += chunk));
    child.stderr.on("data", (chunk: string) => (stderr += chunk));

    if (opts?.timeoutMs && opts.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
        killTimer = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
        killTimer.unref();
      }, opts.timeoutMs);
      timer.unref();
    }

    child.on("error", (error) => {
      finish({
        code: 1,
        stdout,
        stderr: stderr || (error instanceof Error ? error.message : String(error)),
      });
    });

    child.on("close", (code: number | null) => {
      finish({ code: Number(code ?? 1), stdout, stderr });
    });
  });
}

export function combinedOutput(res: RunResult): string {
  return [res.stdout, res.stderr].filter((part) => part.trim().length > 0).join("\n").trim();
}
