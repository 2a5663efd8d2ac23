import { config } from "dotenv";
import { printProfileReport, saveProfileJSON, scrapeCompanyProfile } from "../src/index.js";

config();

/**
 * Profile a Company Website
 *
 * Fetches the home page, follows the about and blog links it finds,
 * prints the report and writes company_profile.json.
 */

async function main() {
  const url = process.argv[2] ?? "https://example.org/";

  const profile = await scrapeCompanyProfile(url, { debug: process.env.DEBUG === "1" });

  printProfileReport(profile);
  const filename = await saveProfileJSON(profile);
  console.log(`Saved to ${filename}`);
}

main().catch(console.error);
