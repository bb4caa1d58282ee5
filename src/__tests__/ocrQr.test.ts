import { describe, expect, it } from "vitest";
import { flattenOcrQr, flattenPage } from "../ocrQr.js";

describe("flattenOcrQr", () => {
  it("flattens one page into numbered, bilingual and nested columns", () => {
    const records = flattenOcrQr([
      {
        file_id: 7,
        file_name: "card1.jpg",
        result: [
          {
            page: 1,
            result: {
              company_names: ["ACME Ltd", "شرکت آکمه"],
              phones: ["021-1234", "0912 000"],
              emails: ["a@acme.com", "b@acme.com"],
              urls: ["acme.com"],
              persons: [{ name: "Ali", position: "Manager" }],
              ocr_text: "raw text",
              social: { telegram: "@acme" },
            },
            qr_link: "https://acme.com/vcard",
          },
        ],
      },
    ]);

    expect(records).toHaveLength(1);
    expect(records[0]?.source).toBe("OCR_QR");
    expect(records[0]?.origin).toEqual({ file: "card1.jpg", page: 1 });
    expect(records[0]?.values).toEqual({
      file_name: "card1.jpg",
      file_id: "7",
      CompanyNameFA: "شرکت آکمه",
      CompanyNameEN: "ACME Ltd",
      Phone1: "021-1234",
      Phone2: "0912 000",
      Email: "a@acme.com",
      Email2: "b@acme.com",
      Website: "acme.com",
      ContactName: "Ali",
      PositionEN: "Manager",
      social_telegram: "@acme",
      QRLink: "https://acme.com/vcard",
    });
  });

  it("accepts a single field object and skips empty pages", () => {
    const records = flattenOcrQr([
      { file_name: "a.pdf", result: [{ emails: ["x@y.com"] }, {}] },
      { file_name: "b.png", result: { notes: "booth 12" } },
      { file_id: 3, result: { notes: "no file name" } },
    ]);
    expect(records.map((r) => r.values)).toEqual([
      { file_name: "a.pdf", Email: "x@y.com" },
      { file_name: "b.png", Notes: "booth 12" },
    ]);
    expect(records[0]?.origin.page).toBe(1);
  });

  it("returns nothing for non-list input", () => {
    expect(flattenOcrQr({ file_name: "x" })).toEqual([]);
    expect(flattenOcrQr(null)).toEqual([]);
  });
});

describe("flattenPage", () => {
  it("spills extra list values into the next free numbered column", () => {
    expect(flattenPage({ faxes: ["1", "2", "3"] })).toEqual({ Fax: "1", Fax2: "2", Fax3: "3" });
  });

  it("puts persons and positions side by side", () => {
    expect(
      flattenPage({
        persons: [
          { name: "Sara", position: "مدیر فروش" },
          { name: "John", position: "CEO" },
        ],
      })
    ).toEqual({ ContactName: "Sara", PositionFA: "مدیر فروش", ContactName2: "John", PositionEN2: "CEO" });
  });

  it("keeps a QR link only when it adds a value", () => {
    expect(flattenPage({ urls: ["https://acme.com"], qr_links: ["https://acme.com", "WIFI:S:booth"] })).toEqual({
      Website: "https://acme.com",
      QRLink: "WIFI:S:booth",
    });
  });
});
