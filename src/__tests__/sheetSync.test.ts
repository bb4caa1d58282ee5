import { describe, expect, it } from "vitest";
import { collectingSink } from "../events.js";
import { columnLetter, diffColumns, synchronizeSheet } from "../sheetSync.js";
import { MemorySheetStore } from "./memorySheetStore.js";

describe("columnLetter", () => {
  it("encodes base-26 without a zero digit", () => {
    expect([0, 25, 26, 27, 51, 52, 701, 702].map(columnLetter)).toEqual(["A", "Z", "AA", "AB", "AZ", "BA", "ZZ", "AAA"]);
  });
});

describe("diffColumns", () => {
  it("returns local columns missing from the header in local order", () => {
    expect(diffColumns(["A", "B"], ["C", "A", "D", "C"])).toEqual(["C", "D"]);
  });
});

describe("synchronizeSheet", () => {
  it("widens the header, backfills old rows and appends", async () => {
    const store = new MemorySheetStore([
      ["CompanyID", "Name"],
      ["C1", "A"],
      ["C2", "B"],
    ]);
    const events = collectingSink();

    const report = await synchronizeSheet(
      store,
      { columns: ["CompanyID", "Name", "NewField"], rows: [{ CompanyID: "C3", Name: "C", NewField: "x" }] },
      { sink: events.sink }
    );

    expect(report).toEqual({
      status: "ok",
      appendedRows: 1,
      totalRows: 3,
      totalColumns: 3,
      totalCells: 12,
      newColumns: ["NewField"],
      headerWritten: true,
      backfilledRows: 2,
    });
    expect(store.grid).toEqual([
      ["CompanyID", "Name", "NewField"],
      ["C1", "A", ""],
      ["C2", "B", ""],
      ["C3", "C", "x"],
    ]);
    expect(store.calls).toEqual(["readHeader", "readFirstColumn", "writeHeader", "writeRange:C2:C3", "appendRows"]);
    expect(events.ofType("sheet.backfilled")).toEqual([{ type: "sheet.backfilled", range: "C2:C3", rows: 2 }]);
  });

  it("appends directly when no column is new", async () => {
    const store = new MemorySheetStore([
      ["CompanyID", "Name"],
      ["C1", "A"],
    ]);

    const report = await synchronizeSheet(store, {
      columns: ["Name", "CompanyID"],
      rows: [{ Name: "=HYPERLINK(x)", CompanyID: "C2" }, { Name: "#REF!", CompanyID: "C3" }],
    });

    expect(store.calls).toEqual(["readHeader", "readFirstColumn", "appendRows"]);
    expect(store.grid.slice(2)).toEqual([
      ["C2", "HYPERLINK(x)"],
      ["C3", ""],
    ]);
    expect(report).toMatchObject({ status: "ok", appendedRows: 2, totalRows: 3, totalCells: 8, headerWritten: false, backfilledRows: 0 });
  });

  it("writes the local header verbatim into an empty sheet", async () => {
    const store = new MemorySheetStore();

    const report = await synchronizeSheet(store, { columns: ["CompanyID", "Email"], rows: [{ CompanyID: "C1" }] });

    expect(store.calls).toEqual(["readHeader", "writeHeader", "appendRows"]);
    expect(store.grid).toEqual([
      ["CompanyID", "Email"],
      ["C1", ""],
    ]);
    expect(report).toMatchObject({ status: "ok", newColumns: ["CompanyID", "Email"], backfilledRows: 0, totalRows: 1 });
  });

  it("refuses to write past the cell limit", async () => {
    const store = new MemorySheetStore([["A"], ["1"]]);

    const report = await synchronizeSheet(store, { columns: ["A"], rows: [{ A: "2" }, { A: "3" }] }, { cellLimit: 3 });

    expect(report.status).toBe("failed");
    if (report.status !== "failed") return;
    expect(report.stage).toBe("capacity");
    expect(report.error.code).toBe("RemoteCapacityExceeded");
    expect(report.error.reason).toBe("Appending 2 rows would need 4 cells, above the limit of 3 cells");
    expect(store.calls).toEqual(["readHeader", "readFirstColumn"]);
  });

  it("classifies a quota failure on append", async () => {
    const store = new MemorySheetStore([["A"]]).failOn("appendRows", {
      code: 429,
      message: "Quota exceeded for quota metric 'Write requests'",
    });
    const events = collectingSink();

    const report = await synchronizeSheet(store, { columns: ["A"], rows: [{ A: "1" }] }, { sink: events.sink });

    expect(report).toMatchObject({ status: "failed", stage: "append", appendedRows: 0 });
    if (report.status !== "failed") return;
    expect(report.error.code).toBe("RemoteQuotaExceeded");
    expect(report.error.retryable).toBe(true);
    expect(events.ofType("sheet.failed")).toEqual([
      {
        type: "sheet.failed",
        stage: "append",
        code: "RemoteQuotaExceeded",
        reason: "Quota exceeded for quota metric 'Write requests'",
      },
    ]);
  });

  it("classifies permission and capacity failures from the service", async () => {
    const denied = new MemorySheetStore().failOn("readHeader", Object.assign(new Error("The caller does not have permission"), { code: 403 }));
    const full = new MemorySheetStore([["A"], ["1"]]).failOn(
      "writeHeader",
      new Error("This action would increase the number of cells in the workbook above the limit of 10000000 cells.")
    );

    const first = await synchronizeSheet(denied, { columns: ["A"], rows: [] });
    const second = await synchronizeSheet(full, { columns: ["A", "B"], rows: [{ A: "2", B: "3" }] });

    expect(first).toMatchObject({ status: "failed", stage: "read_header" });
    expect(second).toMatchObject({ status: "failed", stage: "write_header" });
    if (first.status !== "failed" || second.status !== "failed") return;
    expect(first.error.code).toBe("RemotePermissionDenied");
    expect(first.error.retryable).toBe(false);
    expect(second.error.code).toBe("RemoteCapacityExceeded");
  });
});
