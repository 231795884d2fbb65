import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DEFAULT_DATA_DIR = path.resolve(__dirname, "../../data");

export function resolveDataDir(override?: string): string {
  const configured = override?.trim() || process.env.BOT_DATA_DIR?.trim();
  return configured ? path.resolve(configured) : DEFAULT_DATA_DIR;
}

export function resolveDataFile(directory: string, fileName: string): string {
  return path.join(directory, fileName);
}

export async function ensureDataFile(directory: string, fileName: string, initialValue = ""): Promise<string> {
  await fs.mkdir(directory, { recursive: true });
  const fullPath = resolveDataFile(directory, fileName);
  try {
    await fs.access(fullPath);
  } catch {
    await fs.writeFile(fullPath, initialValue, { encoding: "utf8" });
  }
  return fullPath;
}
