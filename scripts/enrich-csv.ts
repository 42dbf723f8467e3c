#!/usr/bin/env npx tsx
/**
 * Enrich a CSV of company numbers with Companies House data.
 *
 * Reads the "Company Number" column, looks every number up (one request per
 * CH_REQUEST_INTERVAL_MS, plus one per enabled sub-resource), and writes the
 * enriched rows to the output file in the same order. Input columns are kept;
 * enrichment columns are added after them.
 *
 * Usage:
 *   npx tsx scripts/enrich-csv.ts <input.csv> <output.csv>
 *
 * Required env vars:
 *   COMPANIES_HOUSE_API_KEY - Companies House REST API key
 *
 * Optional env vars:
 *   CH_INCLUDE_DIRECTORS, CH_INCLUDE_CHARGES, CH_INCLUDE_INSOLVENCY
 *
 * Note: spreadsheet apps strip leading zeros from CSV company numbers when
 * opening the output; open it as text if that matters.
 */

import path from "path";
import { loadConfig } from "../src/core/config.js";
import { RegistryClient } from "../src/data-sources/registry-client.js";
import {
  readInputSheet,
  writeRecords,
} from "../src/data-sources/spreadsheet.js";
import { BatchRunner } from "../src/domain/company/batch-runner.js";
import { logInfo, logError, getErrorMessage } from "../src/core/logging.js";

async function main(): Promise<void> {
  const [input, output] = process.argv.slice(2);
  if (!input || !output) {
    throw new Error("Usage: enrich-csv.ts <input.csv> <output.csv>");
  }

  const inputPath = path.resolve(input);
  const outputPath = path.resolve(output);
  const config = loadConfig();

  const sheet = await readInputSheet(inputPath);
  logInfo(`Fetching company information for ${sheet.companyNumbers.length} rows...`);

  const runner = new BatchRunner(
    new RegistryClient(config.registry),
    config.enrichment,
  );
  const { records, stats } = await runner.run(sheet.companyNumbers);

  await writeRecords(outputPath, records, config.enrichment, sheet);
  logInfo(
    `Done: ${stats.resolved} resolved, ${stats.noResult} not found, ${stats.blank} blank`,
  );
}

main().catch((error: unknown) => {
  logError("Enrichment failed:", getErrorMessage(error));
  process.exit(1);
});
