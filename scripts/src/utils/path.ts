import { isAbsolute, relative, sep } from "node:path";

export function dedupe<T>(items: T[]): T[] {
  return Array.from(new Set(items));
}

/**
 * Forward-slash path of `target` relative to `root`, or the path unchanged when
 * it lies outside of `root`.
 */
export function toPortableRelative(root: string, target: string): string {
  const rel = relative(root, target);
  if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
    return target.split(sep).join("/");
  }
  return rel.split(sep).join("/");
}
