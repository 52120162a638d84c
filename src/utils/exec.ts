/**
 * Command Runner
 * Thin wrapper over child processes so collaborators can be faked in tests
 */

import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /** Run to completion capturing output; rejects with CommandError */
  run(command: string, args: string[]): Promise<CommandResult>;
  /** Run with inherited stdio; resolves to the exit code */
  runInteractive(command: string, args: string[]): Promise<number>;
}

interface CommandErrorOptions {
  stderr?: string;
  exitCode?: number;
  code?: string;
  cause?: unknown;
}

/**
 * `exitCode` is set when the process ran and failed; `code` carries the
 * errno (such as ENOENT) when it could not be started
 */
export class CommandError extends Error {
  readonly stderr: string;
  readonly exitCode?: number;
  readonly code?: string;

  constructor(message: string, options: CommandErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CommandError";
    this.stderr = options.stderr ?? "";
    this.exitCode = options.exitCode;
    this.code = options.code;
  }

  get started(): boolean {
    return this.exitCode !== undefined;
  }
}

function field(error: unknown, key: string): unknown {
  if (typeof error === "object" && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

function toCommandError(command: string, error: unknown): CommandError {
  const code = field(error, "code");
  const stderr = field(error, "stderr");
  const message = error instanceof Error ? error.message : String(error);

  return new CommandError(`${command}: ${message}`, {
    stderr: typeof stderr === "string" ? stderr : "",
    exitCode: typeof code === "number" ? code : undefined,
    code: typeof code === "string" ? code : undefined,
    cause: error,
  });
}

export class ProcessRunner implements CommandRunner {
  constructor(private maxBuffer = 64 * 1024 * 1024) {}

  async run(command: string, args: string[]): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        encoding: "utf-8",
        maxBuffer: this.maxBuffer,
      });
      return { stdout, stderr };
    } catch (error) {
      throw toCommandError(command, error);
    }
  }

  runInteractive(command: string, args: string[]): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: "inherit", shell: false });
      child.once("error", (error) => reject(toCommandError(command, error)));
      child.once("close", (code) => resolve(code ?? 1));
    });
  }
}
