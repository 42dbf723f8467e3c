import type { RegistryLookup } from "../../data-sources/registry-client.js";
import type { EnrichmentOptions } from "../../core/config.js";
import {
  NO_RESULT,
  NO_DIRECTORS,
  NO_CHARGES,
  NO_INSOLVENCY_DATA,
} from "./types.js";
import type {
  BatchProgress,
  BatchStats,
  CompanyProfile,
  CompanyRecord,
} from "./types.js";
import {
  formatAddress,
  formatCharges,
  formatCompanyType,
  formatDirectors,
  formatInsolvency,
  formatJurisdiction,
} from "./formatters.js";
import { logDebug, logInfo } from "../../core/logging.js";

export type BatchOptions = EnrichmentOptions;

export type ProgressHook = (progress: BatchProgress) => void;

export interface BatchResult {
  records: CompanyRecord[];
  stats: BatchStats;
}

/** One enriched record and whether its profile lookup found a company. */
export interface EnrichedCompany {
  record: CompanyRecord;
  resolved: boolean;
}

export function logProgress(progress: BatchProgress): void {
  const prefix = `${progress.index}/${progress.total} (${progress.percent}%)`;
  logInfo(
    progress.companyNumber
      ? `${prefix}: ${progress.companyNumber} | ${progress.label}`
      : `${prefix}: ${progress.label}`,
  );
}

// Fields every record carries, plus the optional ones switched on.
function sentinelRecord(
  companyNumber: string,
  options: BatchOptions,
): CompanyRecord {
  return {
    companyNumber,
    companyName: NO_RESULT,
    jurisdiction: NO_RESULT,
    type: NO_RESULT,
    registeredOfficeAddress: NO_RESULT,
    ...(options.includeDirectors && { directors: NO_DIRECTORS }),
    ...(options.includeCharges && { charges: NO_CHARGES }),
    ...(options.includeInsolvency && { insolvency: NO_INSOLVENCY_DATA }),
  };
}

/**
 * Drives a list of company numbers through the registry one at a time and
 * flattens each into an output record. Exactly one record per input, in
 * input order; a failed lookup yields sentinel values, never an exception.
 */
export class BatchRunner {
  private client: RegistryLookup;
  private options: BatchOptions;
  private onProgress: ProgressHook;

  constructor(
    client: RegistryLookup,
    options: BatchOptions,
    onProgress: ProgressHook = logProgress,
  ) {
    this.client = client;
    this.options = options;
    this.onProgress = onProgress;
  }

  async run(
    companyNumbers: ReadonlyArray<string | null | undefined>,
  ): Promise<BatchResult> {
    const total = companyNumbers.length;
    const records: CompanyRecord[] = [];
    const stats: BatchStats = { total, resolved: 0, noResult: 0, blank: 0 };

    for (let i = 0; i < total; i++) {
      const companyNumber = (companyNumbers[i] ?? "").trim();
      let label = NO_RESULT;

      if (!companyNumber) {
        stats.blank++;
        records.push(sentinelRecord("", this.options));
      } else {
        const { record, resolved } = await this.enrichOne(companyNumber);
        if (resolved) {
          stats.resolved++;
          label = record.companyName;
        } else {
          stats.noResult++;
        }
        records.push(record);
      }

      this.onProgress({
        index: i + 1,
        total,
        percent: Math.floor(((i + 1) * 100) / total),
        companyNumber,
        label,
      });
    }

    return { records, stats };
  }

  async enrichOne(companyNumber: string): Promise<EnrichedCompany> {
    const result = await this.client.fetchProfile(companyNumber);
    if (result.status !== "ok") {
      logDebug(
        `No profile for ${companyNumber}: ${result.status === "error" ? result.error : "empty"}`,
      );
      return {
        record: sentinelRecord(companyNumber, this.options),
        resolved: false,
      };
    }

    const profile = result.data;
    const record: CompanyRecord = {
      companyNumber,
      companyName: profile.company_name || NO_RESULT,
      jurisdiction: formatJurisdiction(profile),
      type: formatCompanyType(profile),
      registeredOfficeAddress: formatAddress(profile.registered_office_address),
    };

    if (this.options.includeDirectors) {
      record.directors = await this.resolveDirectors(profile);
    }
    if (this.options.includeCharges) {
      record.charges = await this.resolveCharges(profile);
    }
    if (this.options.includeInsolvency) {
      record.insolvency = formatInsolvency(profile);
    }

    return { record, resolved: true };
  }

  private async resolveDirectors(profile: CompanyProfile): Promise<string> {
    const officersLink = profile.links?.officers;
    if (!officersLink) return NO_DIRECTORS;
    return formatDirectors(await this.client.fetchDirectors(officersLink));
  }

  private async resolveCharges(profile: CompanyProfile): Promise<string> {
    const chargesLink = profile.links?.charges;
    if (!chargesLink) return NO_CHARGES;
    return formatCharges(await this.client.fetchCharges(chargesLink));
  }
}
