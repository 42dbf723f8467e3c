import {
  NO_RESULT,
  NO_DIRECTORS,
  NO_CHARGES,
  NO_INSOLVENCY_DATA,
} from "./types.js";
import type { Charge, CompanyProfile, RegisteredOfficeAddress } from "./types.js";

const ADDRESS_ORDER: Array<keyof RegisteredOfficeAddress> = [
  "address_line_1",
  "address_line_2",
  "locality",
  "region",
  "postal_code",
  "country",
];

/**
 * Capitalise the first letter of every alphabetic run and lower-case the
 * rest: "england-wales" -> "England-Wales".
 */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) =>
      before + letter.toUpperCase(),
    );
}

export function formatJurisdiction(profile: CompanyProfile): string {
  return profile.jurisdiction ? titleCase(profile.jurisdiction) : NO_RESULT;
}

export function formatCompanyType(profile: CompanyProfile): string {
  return profile.type ? profile.type.toUpperCase() : NO_RESULT;
}

export function formatAddress(address?: RegisteredOfficeAddress): string {
  if (!address) return NO_RESULT;
  const parts = ADDRESS_ORDER.map((key) => address[key]).filter(
    (part): part is string => typeof part === "string" && part.trim() !== "",
  );
  return parts.length > 0 ? parts.join(", ") : NO_RESULT;
}

export function formatDirectors(directors: string[]): string {
  return directors.length > 0 ? directors.join(" | ") : NO_DIRECTORS;
}

export function chargeFields(charge: Charge): string[] {
  return [
    `Description: ${charge.classification}`,
    `Created: ${charge.createdOn ?? NO_RESULT}`,
    `Delivered: ${charge.deliveredOn ?? NO_RESULT}`,
    `Status: ${charge.status}`,
    `Persons entitled: ${charge.personEntitled ?? NO_RESULT}`,
    charge.particulars !== null
      ? `Short particulars: ${charge.particulars}`
      : NO_RESULT,
  ];
}

/**
 * Render charges as numbered blocks:
 *   1:
 *   Description: ...
 *   ...
 *
 *   2:
 *   ...
 */
export function formatCharges(charges: Charge[]): string {
  if (charges.length === 0) return NO_CHARGES;
  return charges
    .map(
      (charge, i) =>
        `${i + 1}:\n` + chargeFields(charge).map((f) => `${f}\n`).join("") + "\n",
    )
    .join("")
    .trim();
}

export function formatInsolvency(profile: CompanyProfile): string {
  if (profile.has_insolvency_history === undefined) return NO_INSOLVENCY_DATA;
  return profile.has_insolvency_history ? "Yes" : "No";
}
