import crypto from "node:crypto";
import { dump } from "js-yaml";

import { PERCENT_DIGITS } from "../constants.js";

export function stringifyDeterministic(value: unknown): string {
  const yaml = dump(value, {
    noRefs: true,
    sortKeys: true,
    lineWidth: 120,
    noCompatMode: true
  });
  return ensureLf(ensureTrailingNewline(yaml));
}

export function ensureTrailingNewline(input: string): string {
  return input.endsWith("\n") ? input : `${input}\n`;
}

export function ensureLf(input: string): string {
  return input.replace(/\r\n/g, "\n");
}

export function computeSha256(content: string): string {
  return crypto.createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Fixed-point rendering that never prints "-0.0".
 */
export function formatFixed(value: number, digits: number = PERCENT_DIGITS): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot format non-finite value ${value}`);
  }
  const text = value.toFixed(digits);
  return /^-0(\.0*)?$/.test(text) ? text.slice(1) : text;
}

export function formatPercent(ratio: number): string {
  return formatFixed(ratio * 100);
}

export function formatSignedPp(deltaPp: number): string {
  const text = formatFixed(deltaPp);
  return text.startsWith("-") || /^0(\.0*)?$/.test(text) ? text : `+${text}`;
}
