import { stat } from "fs/promises";

/**
 * Check that a path exists and, when `kind` is given, that it is a
 * regular file or a directory
 */
export async function fileExists(
  path: string,
  kind?: "file" | "directory",
): Promise<boolean> {
  try {
    const info = await stat(path);
    if (kind === "file") return info.isFile();
    if (kind === "directory") return info.isDirectory();
    return true;
  } catch {
    return false;
  }
}
