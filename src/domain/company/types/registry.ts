// Companies House API Response Types (raw API shapes)

export interface RegisteredOfficeAddress {
  address_line_1?: string;
  address_line_2?: string;
  locality?: string;
  region?: string;
  postal_code?: string;
  country?: string;
  premises?: string;
  care_of?: string;
  po_box?: string;
}

// Relative paths to sub-resources, e.g. "/company/00000006/officers"
export interface CompanyProfileLinks {
  self?: string;
  officers?: string;
  charges?: string;
  filing_history?: string;
  insolvency?: string;
  persons_with_significant_control?: string;
}

export interface CompanyProfile {
  company_number: string;
  company_name: string;
  jurisdiction?: string; // e.g. "england-wales", "scotland"
  type?: string; // e.g. "ltd", "plc", "llp"
  company_status?: string;
  date_of_creation?: string; // YYYY-MM-DD
  registered_office_address?: RegisteredOfficeAddress;
  links?: CompanyProfileLinks;
  has_insolvency_history?: boolean;
  has_charges?: boolean;
}

export interface CompanySearchItem {
  company_number: string;
  title: string;
  company_status?: string;
  company_type?: string;
  address_snippet?: string;
  date_of_creation?: string;
}

export interface CompanySearchResponse {
  items?: CompanySearchItem[];
  total_results?: number;
  items_per_page?: number;
  start_index?: number;
}

export interface OfficerItem {
  name: string;
  officer_role: string; // "director", "secretary", "llp-member", ...
  appointed_on?: string;
  resigned_on?: string;
}

export interface OfficerListResponse {
  items?: OfficerItem[];
  total_results?: number;
  active_count?: number;
  resigned_count?: number;
}

export interface ChargeItem {
  status: string; // "outstanding" | "part-satisfied" | "fully-satisfied" | "satisfied"
  charge_number?: number;
  classification?: { type?: string; description: string };
  created_on?: string;
  delivered_on?: string;
  persons_entitled?: Array<{ name: string }>;
  particulars?: { type?: string; description?: string };
}

export interface ChargeListResponse {
  items?: ChargeItem[];
  total_count?: number;
  unfiltered_count?: number;
  satisfied_count?: number;
  part_satisfied_count?: number;
}
