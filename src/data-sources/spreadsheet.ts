import fsp from "fs/promises";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { logInfo } from "../core/logging.js";
import type { EnrichmentOptions } from "../core/config.js";
import type { CompanyRecord } from "../domain/company/types.js";

export const COMPANY_NUMBER_COLUMN = "Company Number";

interface OutputColumn {
  header: string;
  value: (record: CompanyRecord) => string;
}

const BASE_COLUMNS: OutputColumn[] = [
  { header: COMPANY_NUMBER_COLUMN, value: (r) => r.companyNumber },
  { header: "Company Name", value: (r) => r.companyName },
  { header: "Jurisdiction", value: (r) => r.jurisdiction },
  { header: "Type", value: (r) => r.type },
  { header: "Registered Office Address", value: (r) => r.registeredOfficeAddress },
];

function outputColumns(options: EnrichmentOptions): OutputColumn[] {
  const columns = [...BASE_COLUMNS];
  if (options.includeDirectors) {
    columns.push({ header: "Directors", value: (r) => r.directors ?? "" });
  }
  if (options.includeCharges) {
    columns.push({ header: "Charges", value: (r) => r.charges ?? "" });
  }
  if (options.includeInsolvency) {
    columns.push({ header: "Insolvency", value: (r) => r.insolvency ?? "" });
  }
  return columns;
}

function assertCsvPath(filePath: string): void {
  if (path.extname(filePath).toLowerCase() !== ".csv") {
    throw new Error(`Only .csv files are supported: ${filePath}`);
  }
}

/** Parsed input: header order, raw rows, and the company numbers in row order. */
export interface InputSheet {
  columns: string[];
  rows: Record<string, string>[];
  companyNumbers: Array<string | null>;
}

/**
 * Parse an input CSV. Values stay strings so leading zeros survive; empty
 * "Company Number" cells come back as null.
 */
export function parseInputSheet(content: string): InputSheet {
  let columns: string[] = [];
  const rows = parse(content, {
    columns: (header: string[]) => {
      columns = header;
      return header;
    },
    skip_empty_lines: true,
    trim: true,
    bom: true,
  }) as Record<string, string>[];

  if (!columns.includes(COMPANY_NUMBER_COLUMN)) {
    throw new Error(`Input is missing a "${COMPANY_NUMBER_COLUMN}" column`);
  }

  return {
    columns,
    rows,
    companyNumbers: rows.map((row) => {
      const value = row[COMPANY_NUMBER_COLUMN];
      return value ? value : null;
    }),
  };
}

/**
 * Render records as CSV. With a source sheet, each record is written over
 * its source row: input columns keep their order, enrichment columns
 * overwrite same-named inputs or are appended, and "Company Number" keeps
 * the value as it was read.
 */
export function serializeRecords(
  records: CompanyRecord[],
  options: EnrichmentOptions,
  source?: InputSheet,
): string {
  const derived = outputColumns(options);
  if (!source) {
    return stringify(
      records.map((record) => derived.map((c) => c.value(record))),
      { header: true, columns: derived.map((c) => c.header) },
    );
  }

  const byHeader = new Map(derived.map((c) => [c.header, c]));
  byHeader.delete(COMPANY_NUMBER_COLUMN);
  const headers = [
    ...source.columns,
    ...derived
      .map((c) => c.header)
      .filter((h) => !source.columns.includes(h)),
  ];

  return stringify(
    records.map((record, i) => {
      const row = source.rows[i] ?? {};
      return headers.map((h) => {
        const column = byHeader.get(h);
        if (column) return column.value(record);
        return row[h] ?? "";
      });
    }),
    { header: true, columns: headers },
  );
}

export async function readInputSheet(filePath: string): Promise<InputSheet> {
  assertCsvPath(filePath);
  const content = await fsp.readFile(filePath, "utf-8");
  const sheet = parseInputSheet(content);
  logInfo(`Read ${sheet.rows.length} rows from ${filePath}`);
  return sheet;
}

export async function writeRecords(
  filePath: string,
  records: CompanyRecord[],
  options: EnrichmentOptions,
  source?: InputSheet,
): Promise<void> {
  assertCsvPath(filePath);
  await fsp.mkdir(path.dirname(filePath), { recursive: true });
  await fsp.writeFile(filePath, serializeRecords(records, options, source));
  logInfo(`Wrote ${records.length} records to ${filePath}`);
}
