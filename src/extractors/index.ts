export { extractCompanyName } from "./identity.js";
export { extractNavigationLinks, findAboutLink, findFirstLink } from "./navigation.js";
export { extractServices, extractServicePhrases } from "./services.js";
export { extractClients } from "./clients.js";
export { extractProcess } from "./process.js";
export { extractArticles, findBlogCandidates } from "./articles.js";
export { extractContactDetails, findEmail, findPhone } from "./contact.js";
export type { ContactMatches } from "./contact.js";
export { extractAboutDescription } from "./about.js";
