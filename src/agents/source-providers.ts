import axios, { type AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { log, errorMessage } from "../logging.js";
import type { RawSourceItem, ResearchSources } from "../types/research.js";
import type { SourcesConfig } from "../utils/config-loader.js";

const DUCKDUCKGO_HTML = "https://html.duckduckgo.com/html/";
const NEWSAPI_EVERYTHING = "https://newsapi.org/v2/everything";
const WIKIPEDIA_SUMMARY = "https://en.wikipedia.org/api/rest_v1/page/summary/";

const BROWSER_HEADERS = {
  "User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

/**
 * DuckDuckGo wraps result links in a redirect; unwrap to the target URL
 */
export function unwrapDuckDuckGoLink(href: string): string {
  try {
    const url = new URL(href, "https://duckduckgo.com");
    const target = url.searchParams.get("uddg");
    return target ?? url.toString();
  } catch {
    return href;
  }
}

export function parseDuckDuckGoResults(html: string, maxResults: number): RawSourceItem[] {
  const $ = cheerio.load(html);
  const results: RawSourceItem[] = [];

  $(".result").each((_, elem) => {
    if (results.length >= maxResults) return false;

    const $elem = $(elem);
    const $link = $elem.find("a.result__a").first();
    const title = $link.text().trim();
    const href = $link.attr("href") ?? "";
    const snippet = $elem.find(".result__snippet").first().text().trim();

    if (title && href) {
      results.push({ title, snippet, href: unwrapDuckDuckGoLink(href) });
    }
    return undefined;
  });

  return results;
}

export function parseNewsArticles(data: unknown): RawSourceItem[] {
  if (!isRecord(data) || !Array.isArray(data.articles)) return [];

  return data.articles.filter(isRecord).map(article => ({
    title: stringOrNull(article.title),
    source: isRecord(article.source) ? stringOrNull(article.source.name) : null,
    description: stringOrNull(article.description),
    url: stringOrNull(article.url),
  }));
}

/**
 * Fetches raw research material for a company. Each provider reports
 * failure as an empty result and logs it.
 */
export class SourceProviders {
  private readonly http: AxiosInstance;
  private readonly config: SourcesConfig;

  constructor(config: SourcesConfig, http: AxiosInstance = axios.create()) {
    this.config = config;
    this.http = http;
  }

  async searchWeb(query: string): Promise<RawSourceItem[]> {
    log("Searching with DuckDuckGo", "info", { query });
    try {
      const response = await this.http.get<string>(DUCKDUCKGO_HTML, {
        params: { q: query },
        timeout: this.config.timeoutMs,
        headers: BROWSER_HEADERS,
        responseType: "text",
      });
      const results = parseDuckDuckGoResults(String(response.data), this.config.webMaxResults);
      log(`Web search returned ${results.length} results`, "info");
      return results;
    } catch (error) {
      log("Web search failed", "warning", { query, message: errorMessage(error) });
      return [];
    }
  }

  async fetchNews(company: string): Promise<RawSourceItem[]> {
    if (!this.config.newsApiKey) {
      log("NEWSAPI_KEY not set, skipping news", "debug");
      return [];
    }

    try {
      const response = await this.http.get<unknown>(NEWSAPI_EVERYTHING, {
        params: {
          q: company,
          pageSize: this.config.newsPageSize,
          sortBy: "relevancy",
          language: "en",
          apiKey: this.config.newsApiKey,
        },
        timeout: this.config.timeoutMs,
      });
      const articles = parseNewsArticles(response.data);
      log(`News search returned ${articles.length} articles`, "info");
      return articles;
    } catch (error) {
      log("News fetch failed", "warning", { company, message: errorMessage(error) });
      return [];
    }
  }

  async fetchWikipediaSummary(name: string): Promise<string | null> {
    const title = encodeURIComponent(name.trim().replace(/\s+/g, "_"));
    try {
      const response = await this.http.get<unknown>(`${WIKIPEDIA_SUMMARY}${title}`, {
        timeout: this.config.timeoutMs,
        validateStatus: status => status < 500,
      });
      if (response.status === 404) {
        log(`No Wikipedia page for ${name}`, "info");
        return null;
      }

      const extract = isRecord(response.data) ? stringOrNull(response.data.extract) : null;
      return extract ? extract.slice(0, this.config.wikiMaxChars) : null;
    } catch (error) {
      log("Wikipedia fetch failed", "warning", { name, message: errorMessage(error) });
      return null;
    }
  }

  /**
   * Gather web, news and wiki material concurrently
   */
  async fetchAll(company: string): Promise<ResearchSources> {
    const [web, news, wiki] = await Promise.all([
      this.searchWeb(company),
      this.fetchNews(company),
      this.fetchWikipediaSummary(company),
    ]);
    return { web, news, wiki };
  }
}
