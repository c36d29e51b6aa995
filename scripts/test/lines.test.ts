import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";

import { readBoundedLines, type BoundedLine } from "../src/logs/lines.js";
import { makeTempDir, removeDir } from "./fixtures/logs.js";

async function collect(path: string, maxLineBytes: number): Promise<BoundedLine[]> {
  const lines: BoundedLine[] = [];
  for await (const line of readBoundedLines(path, maxLineBytes)) {
    lines.push(line);
  }
  return lines;
}

describe("readBoundedLines", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("splits on LF, strips CR and keeps a final unterminated line", async () => {
    const path = join(dir, "log.jsonl");
    await writeFile(path, "alpha\r\n\nbeta", "utf8");

    expect(await collect(path, 16)).toEqual([
      { text: "alpha", bytes: 5 },
      { text: "", bytes: 0 },
      { text: "beta", bytes: 4 },
    ]);
  });

  it("drops the content of a line over the bound but reports its size", async () => {
    const path = join(dir, "log.jsonl");
    await writeFile(path, `${"y".repeat(300_000)}\nok\n`, "utf8");

    expect(await collect(path, 8)).toEqual([
      { text: null, bytes: 300_000 },
      { text: "ok", bytes: 2 },
    ]);
  });

  it("accepts a line of exactly the bound", async () => {
    const path = join(dir, "log.jsonl");
    await writeFile(path, "12345678\r\n123456789\n", "utf8");

    expect(await collect(path, 8)).toEqual([
      { text: "12345678", bytes: 8 },
      { text: null, bytes: 9 },
    ]);
  });

  it("decodes multi-byte characters split across reads", async () => {
    const path = join(dir, "log.jsonl");
    const text = "é".repeat(40_000);
    await writeFile(path, `${text}\n`, "utf8");

    expect(await collect(path, 100_000)).toEqual([{ text, bytes: 80_000 }]);
  });
});
