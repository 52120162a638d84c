/**
 * Claude Executor
 * Hands downloaded images to the `claude` CLI together with a prompt
 */

import { ProcessRunner, type CommandRunner } from "../utils/exec";
import { analysisError, securityError, validationError } from "../utils/errors";

const SUSPICIOUS_FRAGMENTS = ["rm -rf", "sudo ", "eval(", "exec(", "$(", "`"];

/**
 * @throws AppError when the prompt is empty or looks like shell injection,
 * or when there is no non-empty image reference
 */
export function validateAnalysisInput(prompt: string, images: string[]): void {
  if (!prompt) throw validationError("prompt cannot be empty");
  if (!images.some((image) => image.length > 0)) {
    throw validationError(
      "at least one image is required",
      "Check that images were downloaded before sending them",
    );
  }

  const lower = prompt.toLowerCase();
  const fragment = SUSPICIOUS_FRAGMENTS.find((f) => lower.includes(f));
  if (fragment) {
    throw securityError(`prompt contains potentially dangerous content: ${fragment}`);
  }
}

export function sanitizePrompt(prompt: string): string {
  return prompt.replaceAll("\0", "").trim();
}

/**
 * @example
 * buildAnalysisArgs("describe", ["a.png", "", "b.png"], true)
 * // ["--continue", "describe", "a.png", "b.png"]
 */
export function buildAnalysisArgs(
  prompt: string,
  images: string[],
  continueSession: boolean,
): string[] {
  const args: string[] = [];
  if (continueSession) args.push("--continue");
  if (prompt) args.push(prompt);
  return [...args, ...images.filter((image) => image.length > 0)];
}

export interface AnalysisSink {
  checkAvailable(): Promise<void>;
  execute(prompt: string, images: string[], continueSession: boolean): Promise<void>;
}

export class ClaudeExecutor implements AnalysisSink {
  constructor(
    private runner: CommandRunner = new ProcessRunner(),
    private command = "claude",
  ) {}

  async checkAvailable(): Promise<void> {
    try {
      await this.runner.run(this.command, ["--version"]);
    } catch {
      throw validationError(
        "Claude CLI not available",
        "Install Claude CLI or remove the --send flag",
      );
    }
  }

  /**
   * Run the CLI attached to the terminal. No shell is involved.
   */
  async execute(prompt: string, images: string[], continueSession: boolean): Promise<void> {
    if (!prompt) throw validationError("prompt cannot be empty");

    let exitCode: number;
    try {
      exitCode = await this.runner.runInteractive(
        this.command,
        buildAnalysisArgs(prompt, images, continueSession),
      );
    } catch (error) {
      throw analysisError("failed to execute claude command", error);
    }

    if (exitCode !== 0) {
      throw analysisError(`claude command failed with exit code ${exitCode}`);
    }
  }
}
