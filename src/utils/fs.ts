import { stat, writeFile, mkdir } from "fs/promises";
import { dirname } from "node:path";

export type PathKind = "file" | "directory" | "other";

/**
 * Report what lives at a path, or null when nothing does
 */
export async function pathKind(path: string): Promise<PathKind | null> {
  try {
    const info = await stat(path);
    if (info.isFile()) return "file";
    if (info.isDirectory()) return "directory";
    return "other";
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Write a generated file, creating its directory if needed
 */
export async function writeOutput(
  filepath: string,
  content: string,
): Promise<void> {
  await mkdir(dirname(filepath), { recursive: true });
  await writeFile(filepath, content, "utf-8");
}
