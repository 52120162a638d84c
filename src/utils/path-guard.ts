/**
 * Path Guard
 * Keeps output paths inside an allowed base directory
 */

import { isAbsolute, relative, resolve, sep } from "node:path";
import { securityError, validationError } from "./errors";

/**
 * Reject a target that resolves outside `base`
 *
 * @example
 * validatePath("/tmp/out", "/tmp/out/img-01.png") // ok
 * validatePath("/tmp/out", "/tmp/other") // throws
 */
export function validatePath(base: string, target: string): void {
  if (!base) throw validationError("base path cannot be empty");
  if (!target) throw validationError("target path cannot be empty");

  const rel = relative(resolve(base), resolve(target));
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw securityError(
      `path traversal detected: target path "${target}" is outside base directory "${base}"`,
    );
  }
}

/**
 * Validate a user-supplied output directory against `baseDir`.
 * Any `..` segment is refused even when it resolves inside the base.
 */
export function validateOutputPath(baseDir: string, outputDir: string): void {
  if (!outputDir) throw validationError("output directory cannot be empty");

  if (outputDir.split(/[\\/]/).includes("..")) {
    throw securityError(
      `output directory contains a directory traversal sequence: ${outputDir}`,
    );
  }

  validatePath(baseDir, resolve(baseDir, outputDir));
}
