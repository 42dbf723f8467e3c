import dotenv from "dotenv";

// Load environment variables
dotenv.config();

export interface RegistryConfig {
  apiKey: string;
  baseUrl: string;
  requestIntervalMs: number;
  requestTimeoutMs: number;
}

export interface EnrichmentOptions {
  includeDirectors: boolean;
  includeCharges: boolean;
  includeInsolvency: boolean;
}

export interface AppConfig {
  registry: RegistryConfig;
  enrichment: EnrichmentOptions;
}

function envNum(
  key: string,
  fallback: number,
  validate: (n: number) => boolean,
): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envInt(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isInteger);
}

const TRUTHY = ["true", "1", "yes", "on"];
const FALSY = ["false", "0", "no", "off"];

function envBool(key: string, fallback: boolean): boolean {
  const val = (process.env[key] ?? "").trim().toLowerCase();
  if (TRUTHY.includes(val)) return true;
  if (FALSY.includes(val)) return false;
  return fallback;
}

// Security: Only allow the official Companies House public data API
const COMPANIES_HOUSE_BASE_URL = "https://api.company-information.service.gov.uk";

// 600 requests per 5 minutes per key => 500ms average spacing
export const MIN_REQUEST_INTERVAL_MS = 500;
export const DEFAULT_REQUEST_INTERVAL_MS = 600;

export function loadRegistryConfig(): RegistryConfig {
  const config: RegistryConfig = {
    apiKey: (process.env.COMPANIES_HOUSE_API_KEY ?? "").trim(),
    baseUrl: COMPANIES_HOUSE_BASE_URL,
    requestIntervalMs: envInt(
      "CH_REQUEST_INTERVAL_MS",
      DEFAULT_REQUEST_INTERVAL_MS,
    ),
    requestTimeoutMs: envInt("CH_REQUEST_TIMEOUT_MS", 30_000),
  };
  validateRegistryConfig(config);
  return config;
}

/**
 * Validate registry client settings at startup.
 * Throws on misconfiguration rather than hammering the API with a bad key
 * or a delay that breaks the per-key quota.
 */
export function validateRegistryConfig(config: RegistryConfig): void {
  const errors: string[] = [];

  if (!config.apiKey) {
    errors.push("COMPANIES_HOUSE_API_KEY is required");
  }
  if (!config.baseUrl.startsWith("https://")) {
    errors.push("baseUrl must start with https://");
  }
  if (config.requestIntervalMs < MIN_REQUEST_INTERVAL_MS) {
    errors.push(`requestIntervalMs must be >= ${MIN_REQUEST_INTERVAL_MS}`);
  }
  if (config.requestTimeoutMs < 1000 || config.requestTimeoutMs > 120_000) {
    errors.push("requestTimeoutMs must be between 1000 and 120000");
  }

  if (errors.length > 0) {
    throw new Error(
      `Invalid registry config:\n  - ${errors.join("\n  - ")}`,
    );
  }
}

/**
 * Loads the supplemental-data toggles. Insolvency reporting is on by
 * default; directors and charges cost one extra request each per company.
 */
export function loadEnrichmentOptions(): EnrichmentOptions {
  return {
    includeDirectors: envBool("CH_INCLUDE_DIRECTORS", false),
    includeCharges: envBool("CH_INCLUDE_CHARGES", false),
    includeInsolvency: envBool("CH_INCLUDE_INSOLVENCY", true),
  };
}

export function loadConfig(): AppConfig {
  return {
    registry: loadRegistryConfig(),
    enrichment: loadEnrichmentOptions(),
  };
}
