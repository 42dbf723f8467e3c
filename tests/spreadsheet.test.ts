import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("fs/promises", () => ({
  default: {
    mkdir: vi.fn().mockResolvedValue(undefined),
    readFile: vi.fn(),
    writeFile: vi.fn().mockResolvedValue(undefined),
  },
}));

vi.mock("../src/core/logging.js", () => ({
  logInfo: vi.fn(),
  logDebug: vi.fn(),
}));

import fsp from "fs/promises";
import {
  parseInputSheet,
  serializeRecords,
  readInputSheet,
  writeRecords,
} from "../src/data-sources/spreadsheet.js";
import type { CompanyRecord } from "../src/domain/company/types.js";
import { makeOptions } from "./fixtures.js";

const ACME_RECORD: CompanyRecord = {
  companyNumber: "01234567",
  companyName: "ACME WIDGETS LIMITED",
  jurisdiction: "England-Wales",
  type: "LTD",
  registeredOfficeAddress: "1 Main St, London",
  directors: "SMITH, Jane | BROWN, Sam",
  charges: "1:\nDescription: A registered charge",
  insolvency: "No",
};

describe("parseInputSheet", () => {
  it("reads the Company Number column in order, keeping leading zeros", () => {
    const csv = "Company Number,Notes\n00445790,first\nSC123456,second\n";
    expect(parseInputSheet(csv)).toEqual({
      columns: ["Company Number", "Notes"],
      rows: [
        { "Company Number": "00445790", Notes: "first" },
        { "Company Number": "SC123456", Notes: "second" },
      ],
      companyNumbers: ["00445790", "SC123456"],
    });
  });

  it("returns null for blank cells", () => {
    const csv = "Company Number,Notes\n,missing\n01234567,ok\n";
    expect(parseInputSheet(csv).companyNumbers).toEqual([null, "01234567"]);
  });

  it("strips a byte order mark from the header", () => {
    const csv = "\uFEFFCompany Number\n01234567\n";
    const sheet = parseInputSheet(csv);
    expect(sheet.columns).toEqual(["Company Number"]);
    expect(sheet.companyNumbers).toEqual(["01234567"]);
  });

  it("throws when the column is missing", () => {
    const csv = "Number\n01234567\n";
    expect(() => parseInputSheet(csv)).toThrow(
      'Input is missing a "Company Number" column',
    );
  });

  it("throws for a header-only file without the column", () => {
    expect(() => parseInputSheet("Number,Notes\n")).toThrow(
      'Input is missing a "Company Number" column',
    );
  });
});

describe("serializeRecords", () => {
  it("writes only the base columns when no options are enabled", () => {
    const csv = serializeRecords([ACME_RECORD], makeOptions());
    expect(csv).toBe(
      "Company Number,Company Name,Jurisdiction,Type,Registered Office Address\n" +
        '01234567,ACME WIDGETS LIMITED,England-Wales,LTD,"1 Main St, London"\n',
    );
  });

  it("appends enabled optional columns in fixed order", () => {
    const csv = serializeRecords(
      [ACME_RECORD],
      makeOptions({ includeCharges: true, includeInsolvency: true }),
    );
    expect(csv.split("\n")[0]).toBe(
      "Company Number,Company Name,Jurisdiction,Type,Registered Office Address,Charges,Insolvency",
    );
    expect(csv).toContain('"1:\nDescription: A registered charge",No\n');
  });

  it("keeps the source columns and appends enrichment columns", () => {
    const source = parseInputSheet(
      "Notes,Company Number\nfirst,1234567\nsecond,\n",
    );
    const blank: CompanyRecord = {
      companyNumber: "",
      companyName: "[No Result]",
      jurisdiction: "[No Result]",
      type: "[No Result]",
      registeredOfficeAddress: "[No Result]",
      insolvency: "[No Insolvency Data]",
    };

    const csv = serializeRecords(
      [{ ...ACME_RECORD, companyNumber: "01234567" }, blank],
      makeOptions({ includeInsolvency: true }),
      source,
    );

    expect(csv).toBe(
      "Notes,Company Number,Company Name,Jurisdiction,Type,Registered Office Address,Insolvency\n" +
        'first,1234567,ACME WIDGETS LIMITED,England-Wales,LTD,"1 Main St, London",No\n' +
        "second,,[No Result],[No Result],[No Result],[No Result],[No Insolvency Data]\n",
    );
  });

  it("overwrites a source column that shares an enrichment header", () => {
    const source = parseInputSheet(
      "Company Number,Company Name,Notes\n01234567,old name,keep\n",
    );

    const csv = serializeRecords([ACME_RECORD], makeOptions(), source);

    expect(csv).toBe(
      "Company Number,Company Name,Notes,Jurisdiction,Type,Registered Office Address\n" +
        '01234567,ACME WIDGETS LIMITED,keep,England-Wales,LTD,"1 Main St, London"\n',
    );
  });
});

describe("file helpers", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("reads the input sheet from a csv file", async () => {
    vi.mocked(fsp.readFile).mockResolvedValueOnce(
      "Company Number\n01234567\n",
    );

    const sheet = await readInputSheet("/data/input.csv");

    expect(sheet.companyNumbers).toEqual(["01234567"]);
    expect(fsp.readFile).toHaveBeenCalledWith("/data/input.csv", "utf-8");
  });

  it("rejects non-csv input paths", async () => {
    await expect(readInputSheet("/data/input.xlsx")).rejects.toThrow(
      "Only .csv files are supported",
    );
    expect(fsp.readFile).not.toHaveBeenCalled();
  });

  it("writes serialized records to disk", async () => {
    await writeRecords("/data/out/result.csv", [ACME_RECORD], makeOptions());

    expect(fsp.mkdir).toHaveBeenCalledWith("/data/out", { recursive: true });
    expect(fsp.writeFile).toHaveBeenCalledWith(
      "/data/out/result.csv",
      serializeRecords([ACME_RECORD], makeOptions()),
    );
  });

  it("writes records over their source rows when given the input sheet", async () => {
    const source = parseInputSheet("Company Number,Notes\n01234567,keep\n");

    await writeRecords("/data/result.csv", [ACME_RECORD], makeOptions(), source);

    expect(fsp.writeFile).toHaveBeenCalledWith(
      "/data/result.csv",
      "Company Number,Notes,Company Name,Jurisdiction,Type,Registered Office Address\n" +
        '01234567,keep,ACME WIDGETS LIMITED,England-Wales,LTD,"1 Main St, London"\n',
    );
  });
});
