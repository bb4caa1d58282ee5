import { Writable } from "node:stream";
import pino from "pino";
import { describe, expect, it } from "vitest";
import { collectingSink, loggerSink } from "../events.js";
import { createLogger, getLogger } from "../logger.js";

describe("loggerSink", () => {
  it("logs missing sources as warnings and progress as info", async () => {
    const lines: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString());
        callback();
      },
    });
    const sink = loggerSink(pino({ level: "info", base: undefined, timestamp: false }, stream));

    sink({ type: "source.missing", source: "scrape", path: "/s/scrape.json", fatal: false });
    sink({ type: "sheet.appended", rows: 2 });
    await new Promise((resolve) => setImmediate(resolve));

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { level: 40, event: "source.missing", source: "scrape", path: "/s/scrape.json", fatal: false, msg: "source.missing" },
      { level: 30, event: "sheet.appended", rows: 2, msg: "sheet.appended" },
    ]);
  });
});

describe("collectingSink", () => {
  it("filters collected events by type", () => {
    const events = collectingSink();
    events.sink({ type: "mode.selected", mode: "excel" });
    events.sink({ type: "repeats.blanked", cells: 4 });
    expect(events.events).toHaveLength(2);
    expect(events.ofType("repeats.blanked")).toEqual([{ type: "repeats.blanked", cells: 4 }]);
  });
});

describe("createLogger", () => {
  it("builds a root logger at the requested level", () => {
    const log = createLogger({ level: "warn" });
    expect(log.level).toBe("warn");
    expect(log.isLevelEnabled("info")).toBe(false);
  });

  it("names child loggers", () => {
    expect(getLogger("sync").bindings()).toMatchObject({ name: "sync" });
  });
});
