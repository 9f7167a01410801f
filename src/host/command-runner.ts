import { spawn } from "node:child_process";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  timeoutMs?: number;
}

/**
 * Runs one program with an explicit argument vector. Never goes through a
 * host shell. Resolves with the exit code instead of rejecting on non-zero
 * exit; rejects only when the program cannot be started at all.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/** Thrown when the program itself is missing (spawn ENOENT). */
export class CommandNotFoundError extends Error {
  readonly name = "CommandNotFoundError" as const;
  constructor(readonly command: string) {
    super(`Command not found: ${command}`);
  }
}

export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly defaultTimeoutMs = 1_800_000) {}

  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, [...args], {
        stdio: ["pipe", "pipe", "pipe"],
        timeout: timeoutMs,
        killSignal: "SIGKILL",
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "ENOENT") {
          reject(new CommandNotFoundError(command));
        } else {
          reject(err);
        }
      });

      child.on("close", (code, signal) => {
        const err = Buffer.concat(stderr).toString("utf8");
        resolve({
          // A signal (including our own timeout kill) has no exit code.
          exitCode: code ?? 128,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: signal ? `${err}\nterminated by ${signal}` : err,
        });
      });

      if (options.input !== undefined) {
        child.stdin.end(options.input);
      } else {
        child.stdin.end();
      }
    });
  }
}
