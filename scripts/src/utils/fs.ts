import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import fsExtra from "fs-extra";

import { ensureLf, ensureTrailingNewline } from "../report/deterministic.js";

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export async function readTextFile(path: string): Promise<string | null> {
  try {
    const content = await fs.readFile(path, "utf8");
    return content;
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "EISDIR") {
      return null;
    }
    throw error;
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await fsExtra.ensureDir(dirname(path));
  const normalized = ensureTrailingNewline(ensureLf(content));
  await fs.writeFile(path, normalized, "utf8");
}

export async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readTextFile(path);
  if (raw === null) {
    return null;
  }
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export async function removeIfExists(path: string): Promise<void> {
  await fsExtra.remove(path);
}
