/**
 * Collector Module
 * Resolves the target and fetches the issue body and its comments
 */

import { formatTarget, parseTarget } from "../github/target";
import { isAppError, networkError } from "../utils/errors";
import type { PipelineContext, SourceDocument } from "../types";

function wrap(message: string, error: unknown): unknown {
  return isAppError(error) ? error : networkError(message, error);
}

export async function collect(ctx: PipelineContext): Promise<void> {
  const { options, services, logger, tracker } = ctx;

  logger.verbose("Parsing target...");
  const target = parseTarget(options.target);
  ctx.target = target;
  logger.debug(`Parsed ${formatTarget(target)}`);

  logger.info(`Fetching GitHub data for ${formatTarget(target)}...`);

  const issue = await services.source.fetchIssue(target).catch((error: unknown) => {
    throw wrap("failed to fetch issue/PR data", error);
  });
  logger.debug(`Issue body length: ${issue.body.length} characters`);

  const comments = await services.source.fetchComments(target).catch((error: unknown) => {
    throw wrap("failed to fetch comments", error);
  });
  logger.verbose(`Fetched issue and ${comments.length} comments`);

  const documents: SourceDocument[] = [
    { label: "issue", body: issue.body },
    ...comments.map((comment) => ({ label: `comment ${comment.id}`, body: comment.body })),
  ];

  ctx.documents = documents;
  tracker.setDocuments(documents.length);
}
