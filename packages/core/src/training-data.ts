import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { createChildLogger } from "./logger.js";

const logger = createChildLogger({ module: "core:training-data" });

export function trainingDataDir(dataDir: string): string {
  return join(dataDir, "training_data");
}

export function samplesDir(dataDir: string): string {
  return join(dataDir, "writing_samples");
}

/**
 * Write one named JSON artifact under the training-data directory.
 */
export async function saveTrainingData(
  dir: string,
  filename: string,
  data: unknown
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = join(dir, filename);
  await writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
  logger.info({ filePath }, "Saved training data");
  return filePath;
}

/**
 * Read a named JSON artifact. Returns null when the file does not exist;
 * unreadable JSON is an error.
 */
export async function loadTrainingData(
  dir: string,
  filename: string
): Promise<unknown> {
  const filePath = join(dir, filename);
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      logger.warn({ filePath }, "Training data file not found");
      return null;
    }
    throw err;
  }
  const data: unknown = JSON.parse(raw);
  return data;
}
