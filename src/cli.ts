import type { Logger } from "pino";
import { loadConfig, type FusionConfig } from "./config.js";
import { ConfigError, FusionError } from "./errors.js";
import { loggerSink } from "./events.js";
import { configureLogger, getLogger } from "./logger.js";
import { runFusion, writeFusedWorkbook } from "./pipeline.js";
import { GoogleSheetStore, type SheetStore } from "./sheetStore.js";
import { synchronizeSheet } from "./sheetSync.js";

export interface CliOptions {
  session?: string;
  mode?: string;
  out?: string;
  mergeRows: boolean;
  sync: boolean;
}

export const USAGE =
  "Usage: exhibit-ledger [--session DIR] [--mode auto|ocr_qr|excel] [--out FILE] [--no-merge-rows] [--sync]";

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { mergeRows: true, sync: false };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg) continue;

    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);
    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) throw new Error(`Missing value for ${flag}`);
      index += 1;
      return next;
    };

    switch (flag) {
      case "--session":
        options.session = takeValue();
        break;
      case "--mode":
        options.mode = takeValue();
        break;
      case "--out":
        options.out = takeValue();
        break;
      case "--no-merge-rows":
        options.mergeRows = false;
        break;
      case "--sync":
        options.sync = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return options;
}

/** CLI flags win over the environment. */
export function cliEnvironment(
  options: CliOptions,
  env: Record<string, string | undefined>
): Record<string, string | undefined> {
  const merged = { ...env };
  if (options.session) merged.SESSION_DIR = options.session;
  if (options.mode) merged.FUSION_MODE = options.mode;
  if (options.out) merged.OUTPUT_EXCEL = options.out;
  if (!options.mergeRows) merged.MERGE_ROWS = "false";
  return merged;
}

function sheetStoreFor(config: FusionConfig): SheetStore {
  const { spreadsheetId, sheetName, credentialsFile } = config.sheet;
  if (!spreadsheetId) throw new ConfigError(["GOOGLE_SHEET_ID: required with --sync"]);
  return new GoogleSheetStore({ spreadsheetId, sheetName, credentialsFile });
}

async function execute(config: FusionConfig, sync: boolean, log: Logger): Promise<number> {
  const sink = loggerSink(log);
  const result = await runFusion(
    {
      ocrQrJson: config.paths.ocrQrJson,
      scrapeJson: config.paths.scrapeJson,
      webAnalysisXlsx: config.paths.webAnalysisXlsx,
      inputExcel: config.paths.inputExcel,
      sessionDir: config.sessionDir,
    },
    {
      mode: config.mode,
      mergeRows: config.mergeRows,
      scrapeFallback: config.scrapeFallback,
      identity: { defaultCountryCode: config.defaultCountryCode },
      sink,
    }
  );
  await writeFusedWorkbook(result.table, config.paths.outputExcel, sink);
  log.info({ stats: result.stats, warnings: result.warnings.length }, "fusion complete");

  if (!sync) return 0;
  const report = await synchronizeSheet(sheetStoreFor(config), result.table, {
    cellLimit: config.sheet.cellLimit,
    sink,
  });
  if (report.status === "failed") {
    log.error({ stage: report.stage, code: report.error.code, retryable: report.error.retryable }, report.error.reason);
    return 1;
  }
  log.info({ report }, "sheet synchronized");
  return 0;
}

export async function runCli(
  argv: readonly string[],
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n${USAGE}\n`);
    return 2;
  }

  let config: FusionConfig;
  try {
    config = loadConfig(cliEnvironment(options, env));
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    process.stderr.write(`${err.message}\n`);
    return 1;
  }

  configureLogger(config.log);
  const log = getLogger("cli");
  try {
    return await execute(config, options.sync, log);
  } catch (err) {
    if (err instanceof FusionError) {
      log.error({ code: err.code, path: err.path }, err.message);
      return 1;
    }
    if (err instanceof ConfigError) {
      log.error({ issues: err.issues }, err.message);
      return 1;
    }
    throw err;
  }
}
