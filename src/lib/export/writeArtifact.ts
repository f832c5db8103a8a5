import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { describeError, ExportError } from "../errors";
import { exportLog } from "../logger";

export interface ExportArtifact {
  content: string;
  filename: string;
  mimeType: string;
}

/**
 * Write an artifact into `dir` (created if missing) and return its path.
 * @throws ExportError wrapping the file system error
 */
export async function writeArtifact(
  artifact: ExportArtifact,
  dir: string,
): Promise<string> {
  const target = path.resolve(dir, artifact.filename);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(target, artifact.content, "utf8");
  } catch (error) {
    throw new ExportError(
      `Failed to write ${artifact.filename}: ${describeError(error)}`,
      { cause: error },
    );
  }
  exportLog.info(`Wrote ${target}`);
  return target;
}
