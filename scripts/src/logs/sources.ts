import { resolve } from "node:path";

import fg from "fast-glob";
import fsExtra from "fs-extra";

import { logger } from "../utils/logger.js";
import { dedupe } from "../utils/path.js";

export interface LogSourceQuery {
  logDir: string;
  pattern: string;
}

/**
 * Lists log files under `logDir` matching `pattern`, as absolute paths in
 * lexicographic order. A missing directory yields an empty list.
 */
export async function discoverLogSources(query: LogSourceQuery): Promise<string[]> {
  const root = resolve(query.logDir);
  if (!(await fsExtra.pathExists(root))) {
    logger.warn("Log directory not found", { logDir: root });
    return [];
  }

  const entries = await fg(query.pattern, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: false
  });

  const sources = dedupe(entries).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  logger.debug("Discovered log sources", { logDir: root, pattern: query.pattern, count: sources.length });
  return sources;
}
