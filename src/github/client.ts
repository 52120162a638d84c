/**
 * GitHub Client
 * Reads issue and comment bodies through the `gh` CLI
 */

import { z, ZodError } from "zod";
import { calculateBackoffDelay, sleep, type BackoffPolicy } from "../utils/backoff";
import { CommandError, ProcessRunner, type CommandRunner } from "../utils/exec";
import { AppError, authError, errorMessage, networkError } from "../utils/errors";
import type { IssueTarget } from "./target";

// ============================================================================
// Schemas
// ============================================================================

const nullableBody = z
  .string()
  .nullish()
  .transform((body) => body ?? "");

export const IssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: nullableBody,
  state: z.string(),
});

export const CommentSchema = z.object({
  id: z.number().int(),
  body: nullableBody,
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

/** `--paginate --slurp` wraps every page in an outer array */
const CommentPagesSchema = z
  .array(z.array(CommentSchema))
  .transform((pages) => pages.flat());

export type Issue = z.infer<typeof IssueSchema>;
export type Comment = z.infer<typeof CommentSchema>;

/**
 * Where issue text comes from; the pipeline only depends on this
 */
export interface IssueSource {
  fetchIssue(target: IssueTarget): Promise<Issue>;
  fetchComments(target: IssueTarget): Promise<Comment[]>;
}

export interface GitHubClientOptions {
  runner?: CommandRunner;
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
}

// ============================================================================
// Error classification
// ============================================================================

const RETRYABLE_STDERR = [
  "rate limit",
  "server error",
  "bad gateway",
  "service unavailable",
  "gateway timeout",
  "timeout",
  "temporary failure",
];

export function isRetryableGitHubError(stderr: string): boolean {
  const lower = stderr.toLowerCase();
  return RETRYABLE_STDERR.some((needle) => lower.includes(needle));
}

function isNotFound(stderr: string): boolean {
  return stderr.includes("Not Found") || stderr.includes("404");
}

function isUnauthorized(stderr: string): boolean {
  return stderr.includes("Bad credentials") || stderr.includes("401");
}

// ============================================================================
// Client
// ============================================================================

export class GitHubClient implements IssueSource {
  private readonly runner: CommandRunner;
  private readonly maxRetries: number;
  private readonly backoff: BackoffPolicy;

  constructor(options: GitHubClientOptions = {}) {
    this.runner = options.runner ?? new ProcessRunner();
    this.maxRetries = options.maxRetries ?? 3;
    this.backoff = {
      baseDelay: options.baseDelay ?? 1000,
      maxDelay: options.maxDelay ?? 30000,
    };
  }

  async fetchIssue(target: IssueTarget): Promise<Issue> {
    const stdout = await this.api(target, [issuePath(target)]);
    return parseResponse(stdout, IssueSchema);
  }

  async fetchComments(target: IssueTarget): Promise<Comment[]> {
    const stdout = await this.api(target, [
      "--paginate",
      "--slurp",
      `${issuePath(target)}/comments`,
    ]);
    return parseResponse(stdout, CommentPagesSchema);
  }

  /**
   * Verify `gh` is installed and logged in
   */
  async checkAvailable(): Promise<void> {
    try {
      await this.runner.run("gh", ["--version"]);
    } catch (error) {
      throw new AppError("generic", "gh CLI not found", {
        suggestion: "Install GitHub CLI: https://cli.github.com/",
        cause: error,
      });
    }

    try {
      await this.runner.run("gh", ["auth", "status"]);
    } catch {
      throw authError("gh CLI not authenticated");
    }
  }

  private async api(target: IssueTarget, args: string[]): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      try {
        const { stdout } = await this.runner.run("gh", ["api", ...args]);
        return stdout;
      } catch (error) {
        const attempts = attempt + 1;

        if (error instanceof CommandError && error.started) {
          const stderr = error.stderr.trim();
          if (isNotFound(stderr)) {
            throw networkError(
              `issue/PR ${target.number} not found in ${target.owner}/${target.repo}`,
            );
          }
          if (isUnauthorized(stderr)) {
            throw authError("GitHub authentication failed");
          }
          if (attempt < this.maxRetries && isRetryableGitHubError(stderr)) {
            await sleep(calculateBackoffDelay(attempt, this.backoff));
            continue;
          }
          throw networkError(
            `GitHub API error after ${attempts} attempts: ${stderr || errorMessage(error)}`,
          );
        }

        if (attempt < this.maxRetries) {
          await sleep(calculateBackoffDelay(attempt, this.backoff));
          continue;
        }
        throw networkError(`failed to execute gh command after ${attempts} attempts`, error);
      }
    }
  }
}

function issuePath({ owner, repo, number }: IssueTarget): string {
  return `repos/${owner}/${repo}/issues/${number}`;
}

function parseResponse<T>(stdout: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  try {
    return schema.parse(JSON.parse(stdout));
  } catch (error) {
    const detail =
      error instanceof ZodError
        ? error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
        : errorMessage(error);
    throw new AppError("generic", `failed to parse GitHub API response: ${detail}`);
  }
}
