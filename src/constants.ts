export const PRIMARY_FETCH_TIMEOUT_MS = 15000;
export const SECONDARY_FETCH_TIMEOUT_MS = 10000;

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const COMMON_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
  Connection: "keep-alive",
};

export const DEFAULT_JSON_FILENAME = "company_profile.json";
export const DEFAULT_DEBUG_FILENAME = "page_source.html";

// --- DOM scopes ---

export const SECTION_HEADING_TAGS: ReadonlyArray<string> = ["h1", "h2", "h3", "h4", "h5"];
export const CARD_HEADING_TAGS: ReadonlyArray<string> = ["h3", "h4", "h5"];
export const CONTAINER_TAGS: ReadonlyArray<string> = ["div", "section", "article", "main"];
export const ABOUT_PAGE_NOISE_TAGS: ReadonlyArray<string> = ["script", "style", "nav", "footer", "header"];

// --- Navigation keywords ---

export const ABOUT_KEYWORD = "about";

export const NAVIGATION_KEYWORDS = {
  contact: ["contact"],
  careers: ["career", "job", "hiring", "join"],
  privacy: ["privacy"],
  returns: ["return", "refund"],
  terms: ["term", "condition", "tos"],
} as const satisfies Record<string, ReadonlyArray<string>>;

export const BLOG_KEYWORDS: ReadonlyArray<string> = ["blog", "article", "news", "insight", "resource", "post"];

// --- Section keywords ---

export const SERVICE_KEYWORDS: ReadonlyArray<string> = [
  "service",
  "solution",
  "offer",
  "product",
  "expertise",
  "specialization",
];
export const CLIENT_KEYWORDS: ReadonlyArray<string> = ["client", "customer", "partner", "trust", "work with", "portfolio"];
export const PROCESS_KEYWORDS: ReadonlyArray<string> = ["process", "methodology", "approach", "how we", "workflow", "step"];

// --- Thresholds (exclusive bounds unless noted) ---

export const SERVICE_LIST_LIMIT = 5;
export const SERVICE_CARD_LIMIT = 20;
export const SERVICE_ITEM_LENGTH = { min: 3, max: 200 } as const;
export const SERVICE_CARD_TEXT_LENGTH = { min: 10, max: 300 } as const;
export const SERVICE_CARD_HEADING_MIN_LENGTH = 3;
export const SERVICE_PHRASE_MIN_LENGTH = 10;

export const CLIENT_IMAGE_LABEL_LENGTH = { min: 1, max: 100 } as const;
export const CLIENT_TEXT_LENGTH = { min: 2, max: 50 } as const;
export const CLIENT_TEXT_TAGS: ReadonlyArray<string> = ["li", "span", "p", "div"];

export const PROCESS_STEP_MIN_LENGTH = 5;
export const PROCESS_CARD_LIMIT = 10;
export const PROCESS_CARD_TEXT_LENGTH = { min: 10, max: 500 } as const;
export const PROCESS_CARD_NUMBER_WINDOW = 50;
export const PROCESS_DESCRIPTION_MAX_LENGTH = 300;

export const ARTICLE_CARD_LIMIT = 15;
export const ARTICLE_TITLE_TAGS: ReadonlyArray<string> = ["h1", "h2", "h3", "h4", "a"];
export const ARTICLE_TITLE_LENGTH = { min: 5, max: 200 } as const;

export const ABOUT_PARAGRAPH_MIN_LENGTH = 50;
export const ABOUT_PARAGRAPH_LIMIT = 3;

export const PLACEHOLDER_EMAIL_DOMAINS: ReadonlyArray<string> = ["example.com", "domain.com", "email.com"];

// --- Regex ---

export const REGEX_SERVICE_PHRASE = /We (offer|provide|deliver|specialize in) ([^.!?]{10,100})/gi;
export const REGEX_EMAIL = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g;
export const REGEX_PHONE = /(?:\+?1[-.\s]?)?\(?([0-9]{3})\)?[-.\s]?([0-9]{3})[-.\s]?([0-9]{4})/;
export const REGEX_CLIENT_LABEL_SUFFIX = /\s+(logo|icon|image)$/i;
export const REGEX_LOGO_ALT = /logo/i;
export const REGEX_LOGO_WORD = /logo|Logo/g;
export const REGEX_STEP_NUMBER = /\b\d+\b/;
export const TITLE_SEPARATORS: ReadonlyArray<string> = ["|", "-", "–", "—"];
// Matches hrefs that carry their own network location ("https://host", "//host").
export const REGEX_HREF_NETWORK_LOCATION = /^(?:[a-z][a-z0-9+.-]*:)?\/\//i;

// --- Reports ---

export const REPORT_RULE = "=".repeat(80);
export const REPORT_ABOUT_PREVIEW_LENGTH = 300;
export const REPORT_SERVICE_LIMIT = 15;
export const REPORT_SERVICE_LENGTH = 150;
export const REPORT_CLIENT_LIMIT = 20;
export const REPORT_PROCESS_LENGTH = 150;
export const REPORT_ARTICLE_LIMIT = 10;

export const DEBUG_LINK_SAMPLE = 20;
export const DEBUG_HEADING_TAGS: ReadonlyArray<string> = ["h1", "h2", "h3"];
export const DEBUG_HEADING_SAMPLE = 5;
export const DEBUG_HEADING_LENGTH = 80;
export const DEBUG_IMAGE_SAMPLE = 10;
export const DEBUG_IMAGE_SRC_LENGTH = 60;
export const REGEX_DEBUG_SERVICE_MENTION = /service|solution|offering/i;
export const REGEX_DEBUG_CLIENT_MENTION = /client|customer|trusted/i;
