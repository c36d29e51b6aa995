import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { ConfigError, resolveReportRuntimeConfig } from "../src/config/env.js";
import { parseReportArgs, runReportCli, toReportOptions } from "../src/actions/report_cli.js";
import { groupLines, makeTempDir, removeDir, STUDY, writeLog } from "./fixtures/logs.js";

describe("parseReportArgs", () => {
  it("applies layout defaults", () => {
    expect(parseReportArgs([])).toEqual({ help: false, figsDir: "figs", dataDir: "data", placeholder: false });
  });

  it("reads every flag", () => {
    expect(
      parseReportArgs([
        "--logdir",
        "runs",
        "--pattern",
        "*.jsonl",
        "--study",
        "ablation",
        "--routing-mode",
        "predicted",
        "--outdir",
        "paper/figs",
        "--datadir",
        "paper/data",
        "--max-line-bytes",
        "4096",
        "--placeholder",
      ]),
    ).toEqual({
      help: false,
      logDir: "runs",
      pattern: "*.jsonl",
      study: "ablation",
      routingMode: "predicted",
      figsDir: "paper/figs",
      dataDir: "paper/data",
      maxLineBytes: 4096,
      placeholder: true,
    });
  });

  it("rejects unknown flags, missing values and unknown routing modes", () => {
    expect(() => parseReportArgs(["--verbose"])).toThrow(ConfigError);
    expect(() => parseReportArgs(["--logdir"])).toThrow("Missing value for --logdir");
    expect(() => parseReportArgs(["--routing-mode", "random"])).toThrow(ConfigError);
    expect(() => parseReportArgs(["--max-line-bytes", "-5"])).toThrow(ConfigError);
  });
});

describe("resolveReportRuntimeConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveReportRuntimeConfig({})).toEqual({
      logDir: "../logs",
      pattern: "metrics_*.jsonl",
      study: STUDY,
      routingMode: "oracle",
      maxLineBytes: 65536,
      lockStaleMs: 600000,
    });
  });

  it("reads overrides from the environment", () => {
    const config = resolveReportRuntimeConfig({
      SPECGAIN_ROUTING_MODE: "predicted",
      SPECGAIN_MAX_LINE_BYTES: "1024",
      SPECGAIN_STUDY: "ablation",
    });

    expect(config.routingMode).toBe("predicted");
    expect(config.maxLineBytes).toBe(1024);
    expect(config.study).toBe("ablation");
  });

  it("rejects malformed numbers", () => {
    expect(() => resolveReportRuntimeConfig({ SPECGAIN_LOCK_STALE_MS: "soon" })).toThrow(
      "SPECGAIN_LOCK_STALE_MS must be a positive integer, got: soon",
    );
  });
});

describe("toReportOptions", () => {
  it("lets flags win over the environment and resolves paths against cwd", () => {
    const options = toReportOptions(
      parseReportArgs(["--logdir", "runs", "--routing-mode", "oracle"]),
      { SPECGAIN_LOG_DIR: "/elsewhere", SPECGAIN_ROUTING_MODE: "predicted" },
      "/work/paper",
    );

    expect(options.logDir).toBe("/work/paper/runs");
    expect(options.routingMode).toBe("oracle");
    expect(options.outputRoot).toBe("/work/paper");
    expect(options.forcePlaceholder).toBe(false);
  });
});

describe("runReportCli", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await makeTempDir();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(cwd);
  });

  it("writes artifacts from the logs and exits 0", async () => {
    await writeLog(join(cwd, "runs/metrics_a.jsonl"), [
      ...groupLines("qam", "generalist", 20, 15),
      ...groupLines("qam", "specialist", 20, 18),
    ]);

    await expect(runReportCli(["--logdir", "runs"], {}, cwd)).resolves.toBe(0);

    const series = await readFile(join(cwd, "figs/data/specialization_gain_vs_generalist.csv"), "utf8");
    expect(series.split("\n")[1]).toBe("qam,oracle,75.000,90.000,15.000,real");
  });

  it("still exits 0 with placeholder output when no logs exist", async () => {
    await expect(runReportCli(["--logdir", "missing", "--datadir", "tex"], {}, cwd)).resolves.toBe(0);

    const callouts = await readFile(join(cwd, "tex/specialization_callouts.tex"), "utf8");
    expect(callouts.split("\n")).toContain("\\newcommand{\\SpecializationDataSource}{placeholder}");
  });

  it("writes TeX data to a directory outside the working directory", async () => {
    const elsewhere = await makeTempDir("specialization-tex-");
    try {
      await expect(runReportCli(["--logdir", "missing", "--datadir", elsewhere], {}, cwd)).resolves.toBe(0);

      const table = await readFile(join(elsewhere, "specialization_table.tex"), "utf8");
      expect(table.startsWith("% Generated by specialization-report; do not edit by hand.\n")).toBe(true);
    } finally {
      await removeDir(elsewhere);
    }
  });

  it("prints usage for --help without writing anything", async () => {
    await expect(runReportCli(["--help"], {}, cwd)).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("Usage: specialization-report"));
  });

  it("exits 1 on bad configuration", async () => {
    await expect(runReportCli(["--bogus"], {}, cwd)).resolves.toBe(1);
    await expect(runReportCli([], { SPECGAIN_MAX_LINE_BYTES: "0" }, cwd)).resolves.toBe(1);
  });

  it("exits 1 when artifacts cannot be written", async () => {
    const blocked = join(cwd, "blocked");
    await writeFile(blocked, "", "utf8");

    await expect(runReportCli(["--logdir", "missing"], {}, blocked)).resolves.toBe(1);
  });
});
