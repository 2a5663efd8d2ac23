export { formatProfileReport, printProfileReport } from "./text-report.js";
export { CompanyProfileRecordSchema, saveProfileJSON, serializeProfile, toProfileRecord } from "./json-report.js";
export type { CompanyProfileRecord } from "./json-report.js";
export { formatStructureReport, savePageSource } from "./debug-report.js";
