import fs from "node:fs/promises";

import { ensureDataFile, resolveDataFile } from "./dataPaths.js";

export interface AppendOptions<T> {
  readonly directory: string;
  readonly fileName: string;
  readonly record: T;
}

export interface ReadOptions<T> {
  readonly directory: string;
  readonly fileName: string;
  readonly limit?: number;
  readonly mapper: (item: unknown) => T | undefined;
  readonly onInvalidLine?: (error: unknown) => void;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function appendNdjsonRecord<T>({ directory, fileName, record }: AppendOptions<T>): Promise<void> {
  const filePath = await ensureDataFile(directory, fileName);
  const line = `${JSON.stringify(record)}\n`;
  await fs.appendFile(filePath, line, { encoding: "utf8" });
}

/** Newest records first. */
export async function readNdjsonRecords<T>({
  directory,
  fileName,
  limit,
  mapper,
  onInvalidLine,
}: ReadOptions<T>): Promise<T[]> {
  const filePath = resolveDataFile(directory, fileName);
  let content: string;
  try {
    content = await fs.readFile(filePath, { encoding: "utf8" });
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }

  const lines = content.split(/\r?\n/).filter(Boolean);
  const mapped: T[] = [];
  for (let index = lines.length - 1; index >= 0; index -= 1) {
    if (limit !== undefined && mapped.length >= limit) {
      break;
    }
    try {
      const value = mapper(JSON.parse(lines[index] ?? "{}"));
      if (value !== undefined) {
        mapped.push(value);
      }
    } catch (error) {
      onInvalidLine?.(error);
    }
  }
  return mapped;
}
