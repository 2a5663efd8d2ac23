import { writeFile } from "node:fs/promises";
import { z } from "zod";
import type { CompanyProfile } from "../types.js";
import { DEFAULT_JSON_FILENAME } from "../constants.js";

const OptionalString = z.string().nullable();

/**
 * Shape of the JSON file written for a profile.
 */
export const CompanyProfileRecordSchema = z.object({
  company_name: OptionalString,
  website: z.string().min(1),
  about: z.object({
    description: OptionalString,
    page_url: OptionalString,
  }),
  services: z.array(z.string()),
  clients: z.array(z.string()),
  process: z.array(
    z.object({
      step: z.number().int().positive(),
      description: z.string(),
    })
  ),
  articles: z.array(
    z.object({
      title: z.string(),
      url: OptionalString,
    })
  ),
  contact: z.object({
    contact_page: OptionalString,
    email: OptionalString,
    phone: OptionalString,
  }),
  careers: z.object({
    page_url: OptionalString,
  }),
  policies: z.object({
    privacy_policy: OptionalString,
    returns_policy: OptionalString,
    terms_of_service: OptionalString,
  }),
});

export type CompanyProfileRecord = z.infer<typeof CompanyProfileRecordSchema>;

/** Maps a profile onto its snake_case JSON record. */
export function toProfileRecord(profile: CompanyProfile): CompanyProfileRecord {
  return CompanyProfileRecordSchema.parse({
    company_name: profile.companyName,
    website: profile.website,
    about: {
      description: profile.about.description,
      page_url: profile.about.pageUrl,
    },
    services: profile.services,
    clients: profile.clients,
    process: profile.process,
    articles: profile.articles,
    contact: {
      contact_page: profile.contact.contactPage,
      email: profile.contact.email,
      phone: profile.contact.phone,
    },
    careers: {
      page_url: profile.careers.pageUrl,
    },
    policies: {
      privacy_policy: profile.policies.privacyPolicy,
      returns_policy: profile.policies.returnsPolicy,
      terms_of_service: profile.policies.termsOfService,
    },
  });
}

/** Pretty-printed JSON (2-space indent, non-ASCII left unescaped). */
export function serializeProfile(profile: CompanyProfile): string {
  return `${JSON.stringify(toProfileRecord(profile), null, 2)}\n`;
}

/**
 * Writes the profile as UTF-8 JSON to `filename`.
 * @returns The filename written.
 */
export async function saveProfileJSON(profile: CompanyProfile, filename: string = DEFAULT_JSON_FILENAME): Promise<string> {
  await writeFile(filename, serializeProfile(profile), "utf-8");
  return filename;
}
