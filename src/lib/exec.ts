import { execa } from "execa";

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** Stream the child's output to the terminal instead of capturing it. */
  inherit?: boolean;
}

/**
 * Every external command the installer runs goes through a runner, so the
 * planner can be exercised without touching the host.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<ExecResult>;
}

export const systemRunner: CommandRunner = {
  async run(command, args, options = {}) {
    const result = await execa(command, [...args], {
      cwd: options.cwd,
      reject: false,
      stdio: options.inherit ? "inherit" : "pipe",
    });
    return {
      // execa leaves exitCode unset when the binary could not be spawned
      exitCode: result.exitCode ?? 127,
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
    };
  },
};

export async function commandExists(runner: CommandRunner, name: string): Promise<boolean> {
  const result = await runner.run("sh", ["-c", `command -v ${name}`]);
  return result.exitCode === 0;
}
