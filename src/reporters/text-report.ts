import type { CompanyProfile, OutputWriter } from "../types.js";
import {
  REPORT_ABOUT_PREVIEW_LENGTH,
  REPORT_ARTICLE_LIMIT,
  REPORT_CLIENT_LIMIT,
  REPORT_PROCESS_LENGTH,
  REPORT_RULE,
  REPORT_SERVICE_LENGTH,
  REPORT_SERVICE_LIMIT,
} from "../constants.js";

const NOT_FOUND = "Not found";
const NONE_FOUND = "  None found";

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function orNotFound(value: string | null): string {
  return value || NOT_FOUND;
}

/**
 * Renders the profile as the labelled plain-text report printed by the CLI.
 */
export function formatProfileReport(profile: CompanyProfile): string {
  const lines: string[] = [];
  const section = (title: string) => lines.push("", title);

  lines.push("", REPORT_RULE, "COMPANY PROFILE REPORT", REPORT_RULE);

  section("[COMPANY NAME]");
  lines.push(`  ${orNotFound(profile.companyName)}`);

  section("[ABOUT US]");
  lines.push(
    profile.about.description ? `  ${truncate(profile.about.description, REPORT_ABOUT_PREVIEW_LENGTH)}` : `  ${NOT_FOUND}`
  );
  lines.push(`  Page URL: ${orNotFound(profile.about.pageUrl)}`);

  section(`[SERVICES] (${profile.services.length} found)`);
  if (profile.services.length === 0) lines.push(NONE_FOUND);
  profile.services.slice(0, REPORT_SERVICE_LIMIT).forEach((service, index) => {
    lines.push(`  ${index + 1}. ${truncate(service, REPORT_SERVICE_LENGTH)}`);
  });

  section(`[CLIENTS] (${profile.clients.length} found)`);
  if (profile.clients.length === 0) lines.push(NONE_FOUND);
  profile.clients.slice(0, REPORT_CLIENT_LIMIT).forEach((client, index) => {
    lines.push(`  ${index + 1}. ${client}`);
  });

  section(`[PROCESS/METHODOLOGY] (${profile.process.length} steps)`);
  if (profile.process.length === 0) lines.push(NONE_FOUND);
  for (const item of profile.process) {
    lines.push(`  Step ${item.step}: ${truncate(item.description, REPORT_PROCESS_LENGTH)}`);
  }

  section(`[ARTICLES/BLOG] (${profile.articles.length} found)`);
  if (profile.articles.length === 0) lines.push(NONE_FOUND);
  profile.articles.slice(0, REPORT_ARTICLE_LIMIT).forEach((article, index) => {
    lines.push(`  ${index + 1}. ${article.title}`);
    if (article.url) lines.push(`     URL: ${article.url}`);
  });

  section("[CONTACT INFORMATION]");
  lines.push(`  Contact Page: ${orNotFound(profile.contact.contactPage)}`);
  lines.push(`  Email: ${orNotFound(profile.contact.email)}`);
  lines.push(`  Phone: ${orNotFound(profile.contact.phone)}`);

  section("[CAREERS]");
  lines.push(`  Careers Page: ${orNotFound(profile.careers.pageUrl)}`);

  section("[POLICIES]");
  lines.push(`  Privacy Policy: ${orNotFound(profile.policies.privacyPolicy)}`);
  lines.push(`  Returns Policy: ${orNotFound(profile.policies.returnsPolicy)}`);
  lines.push(`  Terms of Service: ${orNotFound(profile.policies.termsOfService)}`);

  lines.push("", REPORT_RULE);
  return `${lines.join("\n")}\n`;
}

export function printProfileReport(profile: CompanyProfile, writer: OutputWriter = process.stdout): void {
  writer.write(formatProfileReport(profile));
}
