import { spawn } from "node:child_process";

export type GitResult = {
  ok: boolean;
  stdout: string;
  stderr: string;
  output: string;
};

const IDENTITY = {
  GIT_AUTHOR_NAME: "dagsmith",
  GIT_AUTHOR_EMAIL: "dagsmith@localhost",
  GIT_COMMITTER_NAME: "dagsmith",
  GIT_COMMITTER_EMAIL: "dagsmith@localhost",
  GIT_TERMINAL_PROMPT: "0",
};

/** Run `git -C dir ...args`. Resolves on any exit code; rejects only when git cannot be started. */
export function git(dir: string, args: string[]): Promise<GitResult> {
  return new Promise((resolve, reject) => {
    const child = spawn("git", ["-C", dir, "-c", "commit.gpgsign=false", ...args], {
      env: { ...process.env, ...IDENTITY },
      stdio: ["ignore", "pipe", "pipe"],
    });
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.on("error", reject);
    child.on("close", (code) => {
      resolve({ ok: code === 0, stdout, stderr, output: stdout + stderr });
    });
  });
}
