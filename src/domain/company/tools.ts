// ============================================================================
// Registry Entry Points
//
// Thin wrappers over RegistryClient and BatchRunner that validate input and
// wrap results in ToolResponse envelopes for the MCP server.
// ============================================================================

import type { RegistryClient } from "../../data-sources/registry-client.js";
import type { EnrichmentOptions } from "../../core/config.js";
import { BatchRunner, logProgress } from "./batch-runner.js";
import {
  formatAddress,
  formatCompanyType,
  formatJurisdiction,
} from "./formatters.js";
import type {
  CompanyChargesResponse,
  CompanyDirectorsResponse,
  CompanyProfile,
  CompanyProfileSummary,
  CompanySearchItem,
  EnrichCompaniesResponse,
  ToolResponse,
} from "./types.js";

const ATTRIBUTION =
  "Contains public sector information licensed under the Open Government Licence v3.0 (Companies House)";

export const MAX_BATCH_SIZE = 100;

export interface SearchCompanyArgs {
  query: string;
}

export interface CompanyNumberArgs {
  company_number: string;
}

export interface EnrichCompaniesArgs {
  company_numbers: Array<string | null>;
  options: EnrichmentOptions;
}

function fail<T>(error: string): ToolResponse<T> {
  return { success: false, error, attribution: ATTRIBUTION };
}

function normalizeCompanyNumber(raw: string): string {
  return raw.trim().toUpperCase();
}

async function resolveProfile(
  client: RegistryClient,
  companyNumber: string,
): Promise<ToolResponse<CompanyProfile>> {
  if (!companyNumber) {
    return fail("company_number parameter is required");
  }
  const result = await client.fetchProfile(companyNumber);
  if (result.status === "error") {
    return fail(`Registry lookup failed for ${companyNumber}: ${result.error}`);
  }
  if (result.status === "empty") {
    return fail(`Company not found: ${companyNumber}`);
  }
  return { success: true, data: result.data, attribution: ATTRIBUTION };
}

export async function searchCompany(
  client: RegistryClient,
  args: SearchCompanyArgs,
): Promise<ToolResponse<CompanySearchItem>> {
  const query = args.query.trim();
  if (!query) {
    return fail("query parameter is required");
  }

  const first = await client.searchFirst(query);
  if (!first) {
    return fail(`No companies found matching "${query}"`);
  }
  return { success: true, data: first, attribution: ATTRIBUTION };
}

export async function getCompanyProfile(
  client: RegistryClient,
  args: CompanyNumberArgs,
): Promise<ToolResponse<CompanyProfileSummary>> {
  const companyNumber = normalizeCompanyNumber(args.company_number);
  const resolved = await resolveProfile(client, companyNumber);
  if (!resolved.success || !resolved.data) {
    return fail(resolved.error ?? "Unknown error");
  }

  const profile = resolved.data;
  return {
    success: true,
    data: {
      companyNumber: profile.company_number,
      companyName: profile.company_name,
      jurisdiction: formatJurisdiction(profile),
      type: formatCompanyType(profile),
      registeredOfficeAddress: formatAddress(profile.registered_office_address),
      status: profile.company_status ?? null,
      dateOfCreation: profile.date_of_creation ?? null,
      hasInsolvencyHistory: profile.has_insolvency_history ?? null,
    },
    attribution: ATTRIBUTION,
  };
}

export async function getCompanyDirectors(
  client: RegistryClient,
  args: CompanyNumberArgs,
): Promise<ToolResponse<CompanyDirectorsResponse>> {
  const companyNumber = normalizeCompanyNumber(args.company_number);
  const resolved = await resolveProfile(client, companyNumber);
  if (!resolved.success || !resolved.data) {
    return fail(resolved.error ?? "Unknown error");
  }

  const officersLink = resolved.data.links?.officers;
  const directors = officersLink
    ? await client.fetchDirectors(officersLink)
    : [];
  return {
    success: true,
    data: { company_number: companyNumber, directors },
    attribution: ATTRIBUTION,
  };
}

export async function getCompanyCharges(
  client: RegistryClient,
  args: CompanyNumberArgs,
): Promise<ToolResponse<CompanyChargesResponse>> {
  const companyNumber = normalizeCompanyNumber(args.company_number);
  const resolved = await resolveProfile(client, companyNumber);
  if (!resolved.success || !resolved.data) {
    return fail(resolved.error ?? "Unknown error");
  }

  const chargesLink = resolved.data.links?.charges;
  const charges = chargesLink ? await client.fetchCharges(chargesLink) : [];
  return {
    success: true,
    data: { company_number: companyNumber, charges },
    attribution: ATTRIBUTION,
  };
}

export async function enrichCompanies(
  client: RegistryClient,
  args: EnrichCompaniesArgs,
): Promise<ToolResponse<EnrichCompaniesResponse>> {
  if (args.company_numbers.length === 0) {
    return fail("company_numbers array is required (1-100 company numbers)");
  }
  if (args.company_numbers.length > MAX_BATCH_SIZE) {
    return fail(
      `Too many company numbers: ${args.company_numbers.length} (max ${MAX_BATCH_SIZE})`,
    );
  }

  const runner = new BatchRunner(client, args.options, logProgress);
  const { records, stats } = await runner.run(
    args.company_numbers.map((n) => (n === null ? null : normalizeCompanyNumber(n))),
  );
  return { success: true, data: { records, stats }, attribution: ATTRIBUTION };
}
