// Domain Types (shaped for output records and tool responses)

export const NO_RESULT = "[No Result]";
export const NO_DIRECTORS = "[No Directors]";
export const NO_CHARGES = "[No Charges]";
export const NO_INSOLVENCY_DATA = "[No Insolvency Data]";

/**
 * Outcome of a single registry request. "empty" covers a 404 or a body with
 * nothing in it; "error" covers every other transport or HTTP failure.
 */
export type LookupResult<T> =
  | { status: "ok"; data: T }
  | { status: "empty" }
  | { status: "error"; error: string };

export interface Charge {
  classification: string;
  createdOn: string | null;
  deliveredOn: string | null;
  status: string;
  // Only the first entitled person is kept; the rest are dropped.
  personEntitled: string | null;
  // First 100 characters plus "...", null when the charge has no description
  particulars: string | null;
}

export interface CompanyRecord {
  companyNumber: string;
  companyName: string;
  jurisdiction: string;
  type: string;
  registeredOfficeAddress: string;
  directors?: string;
  charges?: string;
  insolvency?: string;
}

export interface BatchProgress {
  index: number; // 1-based
  total: number;
  percent: number;
  companyNumber: string;
  label: string;
}

export interface BatchStats {
  total: number;
  resolved: number;
  noResult: number;
  blank: number;
}
