import type { RegistryConfig, EnrichmentOptions } from "../src/core/config.js";
import type {
  ChargeItem,
  CompanyProfile,
  OfficerItem,
} from "../src/domain/company/types.js";

export function makeRegistryConfig(
  overrides?: Partial<RegistryConfig>,
): RegistryConfig {
  return {
    apiKey: "test-key",
    baseUrl: "https://api.company-information.service.gov.uk",
    requestIntervalMs: 0, // No rate limiting unless a test asks for it
    requestTimeoutMs: 30_000,
    ...overrides,
  };
}

export function makeOptions(
  overrides?: Partial<EnrichmentOptions>,
): EnrichmentOptions {
  return {
    includeDirectors: false,
    includeCharges: false,
    includeInsolvency: false,
    ...overrides,
  };
}

/**
 * Build a fully populated company profile. Override any fields as needed.
 */
export function makeProfile(overrides?: Partial<CompanyProfile>): CompanyProfile {
  return {
    company_number: "01234567",
    company_name: "ACME WIDGETS LIMITED",
    jurisdiction: "england-wales",
    type: "ltd",
    company_status: "active",
    date_of_creation: "2001-04-12",
    registered_office_address: {
      address_line_1: "1 Main St",
      address_line_2: "Unit 4",
      locality: "London",
      region: "Greater London",
      postal_code: "EC1A 1AA",
      country: "United Kingdom",
    },
    links: {
      self: "/company/01234567",
      officers: "/company/01234567/officers",
      charges: "/company/01234567/charges",
    },
    has_insolvency_history: false,
    has_charges: true,
    ...overrides,
  };
}

export function makeOfficer(overrides?: Partial<OfficerItem>): OfficerItem {
  return {
    name: "SMITH, Jane",
    officer_role: "director",
    appointed_on: "2010-01-01",
    ...overrides,
  };
}

export function makeChargeItem(overrides?: Partial<ChargeItem>): ChargeItem {
  return {
    status: "outstanding",
    charge_number: 1,
    classification: { type: "charge-description", description: "A registered charge" },
    created_on: "2015-03-02",
    delivered_on: "2015-03-10",
    persons_entitled: [{ name: "Example Bank PLC" }],
    particulars: { type: "brief-description", description: "Freehold land at 1 Main St" },
    ...overrides,
  };
}

/** Axios-shaped success response */
export function ok<T>(data: T): { status: number; data: T } {
  return { status: 200, data };
}

/** Axios-shaped error for a given HTTP status */
export function httpError(status: number): Error & {
  isAxiosError: true;
  response: { status: number };
} {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    isAxiosError: true as const,
    response: { status },
  });
}
