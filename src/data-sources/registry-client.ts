import axios, { type AxiosInstance } from "axios";
import { RateLimiter } from "../core/rate-limiter.js";
import { logDebug, logWarn, getErrorMessage } from "../core/logging.js";
import type { RegistryConfig } from "../core/config.js";
import type {
  Charge,
  ChargeItem,
  ChargeListResponse,
  CompanyProfile,
  CompanySearchItem,
  CompanySearchResponse,
  LookupResult,
  OfficerListResponse,
} from "../domain/company/types.js";

// Sub-resource lists are read as one page; anything past it is ignored.
const SUB_RESOURCE_PAGE = { items_per_page: 200, start_index: 0 };

const PARTICULARS_MAX_LENGTH = 100;

// SSRF prevention: profile links must stay on the API host
const RELATIVE_LINK_PATTERN = /^\/[A-Za-z0-9/_-]*$/;

function isRelativeLink(link: string): boolean {
  return RELATIVE_LINK_PATTERN.test(link) && !link.startsWith("//");
}

function toCharge(item: ChargeItem): Charge {
  const description = item.particulars?.description;
  return {
    classification: item.classification?.description ?? "",
    createdOn: item.created_on ?? null,
    deliveredOn: item.delivered_on ?? null,
    status: item.status,
    personEntitled: item.persons_entitled?.[0]?.name ?? null,
    particulars:
      description !== undefined
        ? `${description.slice(0, PARTICULARS_MAX_LENGTH)}...`
        : null,
  };
}

/**
 * The lookups the batch runner needs. RegistryClient implements it;
 * tests substitute a stub.
 */
export interface RegistryLookup {
  fetchProfile(companyNumber: string): Promise<LookupResult<CompanyProfile>>;
  fetchDirectors(officersLinkPath: string): Promise<string[]>;
  fetchCharges(chargesLinkPath: string): Promise<Charge[]>;
}

export class RegistryClient implements RegistryLookup {
  private client: AxiosInstance;
  private rateLimiter: RateLimiter;

  constructor(config: RegistryConfig) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.requestTimeoutMs,
      // Companies House takes the key as the basic-auth username
      auth: { username: config.apiKey, password: "" },
      headers: { Accept: "application/json" },
      maxRedirects: 0,
    });
    this.rateLimiter = new RateLimiter(config.requestIntervalMs);
  }

  async fetchProfile(
    companyNumber: string,
  ): Promise<LookupResult<CompanyProfile>> {
    return this.query<CompanyProfile>(
      `/company/${encodeURIComponent(companyNumber)}`,
    );
  }

  async searchFirst(name: string): Promise<CompanySearchItem | null> {
    const result = await this.query<CompanySearchResponse>(
      "/search/companies",
      { q: name },
    );
    if (result.status !== "ok") return null;
    return result.data.items?.[0] ?? null;
  }

  async fetchDirectors(officersLinkPath: string): Promise<string[]> {
    const result = await this.querySubResource<OfficerListResponse>(
      officersLinkPath,
    );
    if (result.status !== "ok") return [];

    return (result.data.items ?? [])
      .filter((officer) => officer.officer_role === "director")
      .map((officer) => officer.name);
  }

  async fetchCharges(chargesLinkPath: string): Promise<Charge[]> {
    const result = await this.querySubResource<ChargeListResponse>(
      chargesLinkPath,
    );
    if (result.status !== "ok") return [];

    return (result.data.items ?? [])
      .filter((charge) => charge.status !== "fully-satisfied")
      .map(toCharge);
  }

  private async querySubResource<T>(linkPath: string): Promise<LookupResult<T>> {
    if (!isRelativeLink(linkPath)) {
      logWarn(`Refusing non-relative registry link: ${linkPath}`);
      return { status: "error", error: `Invalid link path: ${linkPath}` };
    }
    return this.query<T>(linkPath, SUB_RESOURCE_PAGE);
  }

  private async query<T>(
    path: string,
    params?: Record<string, string | number>,
  ): Promise<LookupResult<T>> {
    await this.rateLimiter.waitIfNeeded();

    try {
      const response = await this.client.get<T>(path, { params });
      if (response.status !== 200 || !response.data) {
        logDebug(`Registry returned no content for ${path} (${response.status})`);
        return { status: "empty" };
      }
      return { status: "ok", data: response.data };
    } catch (error: unknown) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        logDebug(`Registry resource not found: ${path}`);
        return { status: "empty" };
      }
      const message = getErrorMessage(error);
      logWarn(`Registry request failed for ${path}: ${message}`);
      return { status: "error", error: message };
    }
  }
}
