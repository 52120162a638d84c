/**
 * Target Parsing
 * Turns OWNER/REPO#NUM or an issue/pull URL into its parts
 */

import { validationError } from "../utils/errors";

export interface IssueTarget {
  owner: string;
  repo: string;
  number: number;
}

const OWNER = "([A-Za-z0-9][A-Za-z0-9-]{0,38})";
const REPO = "([A-Za-z0-9._-]+)";
const TAIL = "(?:[/?#].*)?";

const TARGET_PATTERNS = [
  new RegExp(`^${OWNER}/${REPO}#(\\d+)$`),
  new RegExp(`^https://github\\.com/${OWNER}/${REPO}/issues/(\\d+)${TAIL}$`),
  new RegExp(`^https://github\\.com/${OWNER}/${REPO}/pull/(\\d+)${TAIL}$`),
];

const FORMAT_HINT =
  "Use OWNER/REPO#NUM, https://github.com/OWNER/REPO/issues/NUM or https://github.com/OWNER/REPO/pull/NUM";

/**
 * @example
 * parseTarget("octo/demo#12") // { owner: "octo", repo: "demo", number: 12 }
 * parseTarget("https://github.com/octo/demo/pull/7/files") // { ..., number: 7 }
 */
export function parseTarget(input: string): IssueTarget {
  const value = input.trim();
  if (!value) throw validationError("target cannot be empty", FORMAT_HINT);

  for (const pattern of TARGET_PATTERNS) {
    const match = pattern.exec(value);
    if (!match) continue;

    const [, owner = "", repo = "", digits = ""] = match;
    const number = Number.parseInt(digits, 10);

    if (repo.length > 100) {
      throw validationError(`repository name too long (max 100 characters): ${repo}`);
    }
    if (!Number.isSafeInteger(number) || number <= 0) {
      throw validationError(`issue/PR number must be positive, got: ${digits}`);
    }
    return { owner, repo, number };
  }

  throw validationError(`invalid target format: ${value}`, FORMAT_HINT);
}

export function formatTarget(target: IssueTarget): string {
  return `${target.owner}/${target.repo}#${target.number}`;
}
