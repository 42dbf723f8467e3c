// Tool Response Wrappers

import type { CompanyRecord, BatchStats, Charge } from "./records.js";

export interface ToolResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  attribution: string;
}

export interface CompanyProfileSummary
  extends Omit<CompanyRecord, "directors" | "charges" | "insolvency"> {
  status: string | null;
  dateOfCreation: string | null;
  hasInsolvencyHistory: boolean | null;
}

export interface CompanyDirectorsResponse {
  company_number: string;
  directors: string[];
}

export interface CompanyChargesResponse {
  company_number: string;
  charges: Charge[];
}

export interface EnrichCompaniesResponse {
  records: CompanyRecord[];
  stats: BatchStats;
}
