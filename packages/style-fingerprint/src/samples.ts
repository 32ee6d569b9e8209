import { readFile, readdir, writeFile, mkdir } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { createChildLogger, formatError } from "@echopost/core";

const logger = createChildLogger({ module: "style-fingerprint:samples" });

export const SAMPLE_EXTENSIONS = [".txt", ".md", ".text"] as const;

/**
 * Read every non-empty writing sample in the directory, grouped by
 * extension and sorted by file name within each group.
 */
export async function loadSamples(dir: string): Promise<string[]> {
  await mkdir(dir, { recursive: true });

  const files = (await readdir(dir, { withFileTypes: true }))
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .sort();

  const samples: string[] = [];

  for (const ext of SAMPLE_EXTENSIONS) {
    for (const name of files.filter((f) => extname(f) === ext)) {
      try {
        const content = (await readFile(join(dir, name), "utf-8")).trim();
        if (content) {
          samples.push(content);
          logger.debug({ file: name }, "Loaded sample");
        }
      } catch (err) {
        logger.error({ file: name, error: formatError(err) }, "Failed to load sample");
      }
    }
  }

  logger.info({ count: samples.length }, "Loaded writing samples");
  return samples;
}

function timestampName(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `sample_${date}_${time}.txt`;
}

/**
 * Save a new writing sample. Without a filename one is generated from the
 * current local time.
 */
export async function addSample(
  dir: string,
  content: string,
  filename?: string,
  now: Date = new Date()
): Promise<string> {
  const name = filename ? basename(filename) : timestampName(now);
  await mkdir(dir, { recursive: true });

  const filePath = join(dir, name);
  await writeFile(filePath, content, "utf-8");

  logger.info({ file: name }, "Added writing sample");
  return filePath;
}
