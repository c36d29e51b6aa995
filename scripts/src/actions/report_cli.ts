import { resolve } from "node:path";

import type { RoutingMode } from "lib/report/types.js";

import { ConfigError, parsePositiveInt, parseRoutingMode, resolveReportRuntimeConfig } from "../config/env.js";
import { DEFAULT_DATA_DIR, DEFAULT_FIGS_DIR } from "../constants.js";
import { runSpecializationReport, type SpecializationReportOptions } from "../pipeline/specialization.js";
import { WriteFailure } from "../report/write_artifacts.js";
import { logger } from "../utils/logger.js";

export const USAGE =
  "Usage: specialization-report [--logdir <dir>] [--pattern <glob>] [--study <name>]\n" +
  "                             [--routing-mode <oracle|predicted>] [--outdir <dir>] [--datadir <dir>]\n" +
  "                             [--max-line-bytes <n>] [--placeholder]\n\n" +
  "  --logdir          Directory containing metrics_*.jsonl (default: ../logs)\n" +
  "  --pattern         Glob pattern for metric files (default: metrics_*.jsonl)\n" +
  "  --study           Study name to filter on (default: specialization_per_modulation_family)\n" +
  "  --routing-mode    Routing mode used for the table and unqualified macros (default: oracle)\n" +
  "  --outdir          Figure directory; plot series go to <outdir>/data (default: figs)\n" +
  "  --datadir         Directory for TeX data files (default: data)\n" +
  "  --max-line-bytes  Skip log lines longer than this\n" +
  "  --placeholder     Ignore logs and emit the placeholder artifact set\n";

export interface ReportArgs {
  help: boolean;
  logDir?: string;
  pattern?: string;
  study?: string;
  routingMode?: RoutingMode;
  figsDir: string;
  dataDir: string;
  maxLineBytes?: number;
  placeholder: boolean;
}

export function parseReportArgs(argv: readonly string[]): ReportArgs {
  const args: ReportArgs = {
    help: false,
    figsDir: DEFAULT_FIGS_DIR,
    dataDir: DEFAULT_DATA_DIR,
    placeholder: false
  };

  const valueFor = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value === "" || value.startsWith("--")) {
      throw new ConfigError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    switch (token) {
      case "--help":
      case "-h":
        args.help = true;
        break;
      case "--placeholder":
        args.placeholder = true;
        break;
      case "--logdir":
        args.logDir = valueFor(token, i);
        i += 1;
        break;
      case "--pattern":
        args.pattern = valueFor(token, i);
        i += 1;
        break;
      case "--study":
        args.study = valueFor(token, i);
        i += 1;
        break;
      case "--routing-mode":
        args.routingMode = parseRoutingMode(valueFor(token, i), token);
        i += 1;
        break;
      case "--outdir":
        args.figsDir = valueFor(token, i);
        i += 1;
        break;
      case "--datadir":
        args.dataDir = valueFor(token, i);
        i += 1;
        break;
      case "--max-line-bytes":
        args.maxLineBytes = parsePositiveInt(valueFor(token, i), 0, token);
        i += 1;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${token}`);
    }
  }

  return args;
}

export function toReportOptions(
  args: ReportArgs,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): SpecializationReportOptions {
  const runtime = resolveReportRuntimeConfig(env);
  return {
    ...runtime,
    logDir: resolve(cwd, args.logDir ?? runtime.logDir),
    pattern: args.pattern ?? runtime.pattern,
    study: args.study ?? runtime.study,
    routingMode: args.routingMode ?? runtime.routingMode,
    maxLineBytes: args.maxLineBytes ?? runtime.maxLineBytes,
    outputRoot: cwd,
    layout: { dataDir: args.dataDir, figsDir: args.figsDir },
    forcePlaceholder: args.placeholder
  };
}

/**
 * Exit code 0 whenever artifacts were emitted, real or placeholder.
 */
export async function runReportCli(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Promise<number> {
  let options: SpecializationReportOptions;
  try {
    const args = parseReportArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    options = toReportOptions(args, env, cwd);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  logger.info("Starting specialization report", {
    study: options.study,
    logDir: options.logDir,
    routingMode: options.routingMode,
    placeholder: options.forcePlaceholder ?? false
  });

  try {
    await runSpecializationReport(options);
    return 0;
  } catch (error) {
    if (error instanceof WriteFailure) {
      logger.error("Could not write report artifacts", { error: error.message });
      return 1;
    }
    throw error;
  }
}
