/**
 * Text preprocessing for the mock classifier.
 *
 * This module handles:
 * - Tokenization: breaking text into words, keeping cashtags intact
 * - Keyword counting: prefix matches at word boundaries
 * - Ticker extraction: well-known symbols and cashtags
 * - Sarcasm detection: explicit markers only
 */

const KNOWN_TICKERS = new Set([
  "SPY",
  "QQQ",
  "NVDA",
  "TSLA",
  "AAPL",
  "AMD",
  "AMZN",
  "META",
  "GOOGL",
  "MSFT",
]);

const CASHTAG = /^\$([A-Za-z]{1,5})$/;

const SARCASM_INDICATORS = [
  /(?:^|\s)\/s(?=$|\s|[.!?])/,
  /\byeah,? right\b/i,
  /\bsure,? buddy\b/i,
  /\bwhat could (?:possibly )?go wrong\b/i,
  /\bcan'?t go tits up\b/i,
  /\btotally not\b/i,
];

function stripUrls(text: string): string {
  return text.replace(/https?:\/\/\S+/g, " ");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function tokenize(text: string): string[] {
  return stripUrls(text)
    .replace(/[^\w\s'$]|_/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .split(" ")
    .filter((token) => token.length > 0);
}

/**
 * Number of keywords that occur at the start of some word in `text`.
 * Each keyword counts once however often it appears.
 */
export function countKeywords(text: string, keywords: readonly string[]): number {
  return keywords.filter((keyword) =>
    new RegExp(`(?:^|[^\\w])${escapeRegExp(keyword)}`, "i").test(text)
  ).length;
}

export function extractTickers(text: string): string[] {
  const tickers: string[] = [];

  for (const token of tokenize(text)) {
    const bare = token.replace(/'s$/i, "");
    const cashtag = CASHTAG.exec(bare);
    const symbol = cashtag ? cashtag[1].toUpperCase() : bare.toUpperCase();
    if ((cashtag || KNOWN_TICKERS.has(symbol)) && !tickers.includes(symbol)) {
      tickers.push(symbol);
    }
  }

  return tickers;
}

export function detectSarcasm(text: string): boolean {
  const withoutUrls = stripUrls(text);
  return SARCASM_INDICATORS.some((pattern) => pattern.test(withoutUrls));
}
