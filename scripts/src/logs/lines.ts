import { createReadStream } from "node:fs";

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export interface BoundedLine {
  /** `null` when the line exceeded the bound; its bytes were dropped unread. */
  text: string | null;
  bytes: number;
}

/**
 * Splits a file into LF-terminated lines without ever holding more than
 * `maxLineBytes` of a single line in memory. A trailing CR is removed.
 */
export async function* readBoundedLines(path: string, maxLineBytes: number): AsyncGenerator<BoundedLine, void, undefined> {
  let parts: Buffer[] = [];
  let held = 0;
  let total = 0;
  let overflow = false;

  const append = (part: Buffer): void => {
    total += part.length;
    if (overflow) {
      return;
    }
    if (held + part.length > maxLineBytes + 1) {
      // One spare byte for a CR that belongs to the terminator.
      overflow = true;
      parts = [];
      held = 0;
      return;
    }
    parts.push(part);
    held += part.length;
  };

  const finish = (): BoundedLine => {
    let line: BoundedLine;
    if (overflow) {
      line = { text: null, bytes: total };
    } else {
      let buffer = Buffer.concat(parts, held);
      if (buffer.length > 0 && buffer[buffer.length - 1] === CARRIAGE_RETURN) {
        buffer = buffer.subarray(0, buffer.length - 1);
      }
      line =
        buffer.length > maxLineBytes
          ? { text: null, bytes: buffer.length }
          : { text: buffer.toString("utf8"), bytes: buffer.length };
    }
    parts = [];
    held = 0;
    total = 0;
    overflow = false;
    return line;
  };

  for await (const chunk of createReadStream(path)) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8");
    let start = 0;
    for (let end = buffer.indexOf(NEWLINE, start); end !== -1; end = buffer.indexOf(NEWLINE, start)) {
      append(buffer.subarray(start, end));
      yield finish();
      start = end + 1;
    }
    if (start < buffer.length) {
      append(buffer.subarray(start));
    }
  }

  if (total > 0) {
    yield finish();
  }
}
