import * as tools from "../domain/company/tools.js";
import {
  type CompanyTool,
  argText,
  argToggle,
  argCompanyNumbers,
  toMcpResult,
} from "./tool-registry.js";

const COMPANY_NUMBER_PROPERTY = {
  company_number: {
    type: "string",
    description:
      'Companies House company number, e.g. "00445790" or "SC123456". Keep leading zeros.',
  },
};

export function getToolDefinitions(): CompanyTool[] {
  return [
    {
      name: "search_company",
      description:
        "Search Companies House by company name and return the top match (company number, name, status, address snippet).",
      inputSchema: {
        type: "object",
        properties: {
          query: {
            type: "string",
            description: "Company name or keywords",
          },
        },
        required: ["query"],
      },
      handler: async (args, ctx) =>
        toMcpResult(
          await tools.searchCompany(ctx.registryClient, {
            query: argText(args, "query"),
          }),
        ),
    },
    {
      name: "get_company_profile",
      description:
        "Get a company's profile by company number: name, jurisdiction, type, registered office address, status, incorporation date and insolvency flag.",
      inputSchema: {
        type: "object",
        properties: COMPANY_NUMBER_PROPERTY,
        required: ["company_number"],
      },
      handler: async (args, ctx) =>
        toMcpResult(
          await tools.getCompanyProfile(ctx.registryClient, {
            company_number: argText(args, "company_number"),
          }),
        ),
    },
    {
      name: "get_company_directors",
      description:
        "List the names of a company's directors (officers with role \"director\"), from the first 200 officers on record.",
      inputSchema: {
        type: "object",
        properties: COMPANY_NUMBER_PROPERTY,
        required: ["company_number"],
      },
      handler: async (args, ctx) =>
        toMcpResult(
          await tools.getCompanyDirectors(ctx.registryClient, {
            company_number: argText(args, "company_number"),
          }),
        ),
    },
    {
      name: "get_company_charges",
      description:
        "List a company's charges that are not fully satisfied: description, created/delivered dates, status, first person entitled and short particulars.",
      inputSchema: {
        type: "object",
        properties: COMPANY_NUMBER_PROPERTY,
        required: ["company_number"],
      },
      handler: async (args, ctx) =>
        toMcpResult(
          await tools.getCompanyCharges(ctx.registryClient, {
            company_number: argText(args, "company_number"),
          }),
        ),
    },
    {
      name: "enrich_companies",
      description:
        "Look up 1-100 company numbers sequentially (rate limited) and return one flattened record per number, in order. Unresolvable numbers yield \"[No Result]\" records. Optional directors, charges and insolvency columns default to the server configuration.",
      inputSchema: {
        type: "object",
        properties: {
          company_numbers: {
            type: "array",
            items: { type: ["string", "null"] },
            description:
              "Company numbers to enrich (max 100). Blank or null entries yield [No Result] records in place.",
          },
          include_directors: {
            type: "boolean",
            description: "Add a Directors field (one extra request per company).",
          },
          include_charges: {
            type: "boolean",
            description: "Add a Charges field (one extra request per company).",
          },
          include_insolvency: {
            type: "boolean",
            description: "Add an Insolvency field from the profile.",
          },
        },
        required: ["company_numbers"],
      },
      handler: async (args, ctx) => {
        const defaults = ctx.config.enrichment;
        return toMcpResult(
          await tools.enrichCompanies(ctx.registryClient, {
            company_numbers: argCompanyNumbers(args, "company_numbers"),
            options: {
              includeDirectors:
                argToggle(args, "include_directors") ??
                defaults.includeDirectors,
              includeCharges:
                argToggle(args, "include_charges") ?? defaults.includeCharges,
              includeInsolvency:
                argToggle(args, "include_insolvency") ??
                defaults.includeInsolvency,
            },
          }),
        );
      },
    },
  ];
}
