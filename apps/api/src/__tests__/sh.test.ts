import { describe, expect, it } from "vitest";
import { combinedOutput, run } from "../lib/sh.js";

describe("run", () => {
  it("collects stdout, stderr and the exit code", async () => {
    const res = await run(["sh", "-c", "echo out; echo err >&2; exit 3"]);

    expect(res).toEqual({ code: 3, stdout: "out\n", stderr: "err\n", timedOut: false });
  });

  it("passes extra environment variables through", async () => {
    const res = await run(["sh", "-c", 'printf %s "$DEVSESSION_TEST_VALUE"'], {
      env: { DEVSESSION_TEST_VALUE: "placeholder" },
    });

    expect(res.stdout).toBe("placeholder");
    expect(res.code).toBe(0);
  });

  it("kills a hanging child once the timeout passes", async () => {
    const started = Date.now();

    const res = await run(["sleep", "10"], { timeoutMs: 200 });

    expect(res.timedOut).toBe(true);
    expect(res.code).not.toBe(0);
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it("resolves instead of rejecting when the binary is missing", async () => {
    const res = await run(["devsession-no-such-binary"]);

    expect(res.code).toBe(1);
    expect(res.timedOut).toBe(false);
    expect(res.stderr).toContain("ENOENT");
  });

  it("refuses an empty argv without spawning", async () => {
    await expect(run([])).resolves.toEqual({ code: 1, stdout: "", stderr: "empty argv", timedOut: false });
  });
});

describe("combinedOutput", () => {
  it("joins the non-empty streams", () => {
    expect(combinedOutput({ code: 1, stdout: "  \n", stderr: "Error: boom\n", timedOut: false })).toBe("Error: boom");
    expect(combinedOutput({ code: 0, stdout: "a", stderr: "b", timedOut: false })).toBe("a\nb");
  });
});
