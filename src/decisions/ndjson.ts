import fs from "node:fs";
import readline from "node:readline";

export type NdjsonReadResult<T> = {
  entries: T[];
  /** 1-based line numbers that were not JSON or were rejected by the mapper. */
  skippedLines: number[];
};

export async function readNdjsonFile<T>(
  filePath: string,
  mapper: (value: unknown) => T | null,
): Promise<NdjsonReadResult<T>> {
  if (!fs.existsSync(filePath)) {
    return { entries: [], skippedLines: [] };
  }
  const stream = fs.createReadStream(filePath, "utf8");
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  const entries: T[] = [];
  const skippedLines: number[] = [];
  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber += 1;
    if (!line.trim()) {
      continue;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      skippedLines.push(lineNumber);
      continue;
    }
    const mapped = mapper(parsed);
    if (mapped === null) {
      skippedLines.push(lineNumber);
      continue;
    }
    entries.push(mapped);
  }
  return { entries, skippedLines };
}
