#!/usr/bin/env node
// DEV TOOL: prints a captured analysis payload the way the insight card renders it.
import "dotenv/config";
import { readFile } from "node:fs/promises";
import { insightLog, silentInsightLogger, type InsightLogger } from "../../logging/insightLog.js";
import { PayloadFileError } from "../config/errors.js";
import { DEFAULT_PIPELINE_CONFIG, loadPipelineConfig, type PipelineConfig } from "../config/pipelineConfig.js";
import { formatDailyInsight } from "../daily/formatDailyInsight.js";
import { seededRandomSource } from "../random/randomSource.js";
import { formatWeeklyInsight } from "../weekly/formatWeeklyInsight.js";

export type PayloadKind = "daily" | "weekly";

export type CliArgs = {
  path: string;
  kind: PayloadKind;
  date?: string;
  seed?: string;
};

export type FormatPayloadFileParams = CliArgs & {
  config?: PipelineConfig;
  logger?: InsightLogger;
};

export type ReadPayloadFile = (path: string) => Promise<string>;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function usage(): string {
  return "Usage: tsx insight_safety/tools/formatInsightPayload.ts [--kind daily|weekly] [--date YYYY-MM-DD] [--seed <seed>] <payload-file>";
}

export function parseCliArgs(args: string[]): CliArgs {
  let kind: PayloadKind = "daily";
  let date: string | undefined;
  let seed: string | undefined;
  let path: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--kind" && i + 1 < args.length) {
      const value = args[i + 1];
      if (value !== "daily" && value !== "weekly") {
        throw new Error("--kind must be daily or weekly");
      }
      kind = value;
      i++;
    } else if (arg === "--date" && i + 1 < args.length) {
      date = args[i + 1];
      if (!DATE_PATTERN.test(date)) {
        throw new Error("--date must be YYYY-MM-DD");
      }
      i++;
    } else if (arg === "--seed" && i + 1 < args.length) {
      seed = args[i + 1];
      i++;
    } else if (!arg.startsWith("--")) {
      path = arg;
    }
  }

  if (!path) {
    throw new Error(usage());
  }
  return { path, kind, date, seed };
}

/**
 * Read a payload file and format it. The file holds either JSON or legacy
 * text; both are handed to the formatter as-is.
 */
export async function formatInsightPayloadFile(
  params: FormatPayloadFileParams,
  readPayload: ReadPayloadFile = (path) => readFile(path, "utf8")
): Promise<string> {
  let raw: string;
  try {
    raw = await readPayload(params.path);
  } catch (err) {
    throw new PayloadFileError(params.path, err);
  }

  const config = params.config ?? DEFAULT_PIPELINE_CONFIG;
  const logger = params.logger ?? silentInsightLogger;

  if (params.kind === "daily") {
    return formatDailyInsight(raw, {
      random: params.seed === undefined ? undefined : seededRandomSource(params.seed),
      config,
      logger,
    });
  }

  // Noon UTC keeps the weekday stable for a calendar date.
  const referenceDate = params.date ? new Date(`${params.date}T12:00:00Z`) : new Date();
  const weekly = formatWeeklyInsight(raw, { referenceDate, timeZone: "UTC", config, logger });

  const lines = [weekly.summary, "", ...weekly.days.map((day) => `${day.label} — ${day.detail}`)];
  if (weekly.preparation_tip) lines.push("", `Preparation tip: ${weekly.preparation_tip}`);
  return lines.join("\n");
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadPipelineConfig();
  const output = await formatInsightPayloadFile({
    ...args,
    config,
    logger: config.log_events ? insightLog : silentInsightLogger,
  });
  console.log(output);
}

if (process.argv[1]) {
  const invokedPath = (() => {
    try {
      return new URL(`file://${process.argv[1]}`).href;
    } catch {
      return undefined;
    }
  })();
  if (invokedPath && invokedPath === import.meta.url) {
    main().catch((err) => {
      console.error(err);
      process.exit(1);
    });
  }
}
