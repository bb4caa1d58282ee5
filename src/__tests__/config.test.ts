import { mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { findEnrichedWorkbook, loadConfig, runTimestamp } from "../config.js";
import { ConfigError } from "../errors.js";

describe("loadConfig", () => {
  it("derives default file locations from the session directory", () => {
    const config = loadConfig({ SESSION_DIR: "/tmp/session" }, new Date(2024, 0, 2, 3, 4, 5));
    expect(config.sessionDir).toBe("/tmp/session");
    expect(config.paths).toEqual({
      ocrQrJson: "/tmp/session/mix_ocr_qr.json",
      scrapeJson: "/tmp/session/gemini_scrap_output.json",
      webAnalysisXlsx: "/tmp/session/web_analysis.xlsx",
      inputExcel: undefined,
      outputExcel: "/tmp/session/merged_final_20240102_030405.xlsx",
    });
    expect(config).toMatchObject({
      mode: "auto",
      mergeRows: true,
      scrapeFallback: "most_common",
      defaultCountryCode: "98",
      log: { level: "info", pretty: false },
      sheet: { sheetName: "Sheet1", cellLimit: 10_000_000 },
    });
  });

  it("parses booleans and numbers from strings", () => {
    const config = loadConfig({ SESSION_DIR: "/s", MERGE_ROWS: "no", LOG_PRETTY: "1", SHEET_CELL_LIMIT: "5000" });
    expect(config.mergeRows).toBe(false);
    expect(config.log.pretty).toBe(true);
    expect(config.sheet.cellLimit).toBe(5000);
  });

  it("reports every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ FUSION_MODE: "fast", DEFAULT_COUNTRY_CODE: "x" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(/^FUSION_MODE: /);
    expect(caught.issues[1]).toBe("DEFAULT_COUNTRY_CODE: must be 1-4 digits");
  });
});

describe("runTimestamp", () => {
  it("formats local time as yyyyMMdd_HHmmss", () => {
    expect(runTimestamp(new Date(2024, 11, 31, 23, 59, 9))).toBe("20241231_235909");
  });
});

describe("findEnrichedWorkbook", () => {
  it("picks the newest enriched workbook", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "ledger-config-"));
    try {
      const recent = path.join(dir, "output_enriched_1.xlsx");
      const stale = path.join(dir, "output_enriched_2.xlsx");
      await writeFile(recent, "");
      await writeFile(stale, "");
      await writeFile(path.join(dir, "notes.xlsx"), "");
      await utimes(recent, new Date(2024, 0, 2), new Date(2024, 0, 2));
      await utimes(stale, new Date(2024, 0, 1), new Date(2024, 0, 1));

      expect(await findEnrichedWorkbook(dir)).toBe(recent);
      expect(await findEnrichedWorkbook(path.join(dir, "missing"))).toBeUndefined();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
