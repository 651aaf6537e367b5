import { z } from "zod";
import { errorMessage } from "../../utils/helpers.js";
import { stringArg, type Tool } from "./base.js";

const BRAVE_SEARCH_URL = "https://api.search.brave.com/res/v1/web/search";
const USER_AGENT = "Mozilla/5.0 (compatible; switchyard)";

const BraveResultsSchema = z.object({
  web: z.object({
    results: z.array(z.object({
      title: z.string().default(""),
      url: z.string().default(""),
      description: z.string().optional(),
    })).default([]),
  }).optional(),
});

function stripTags(html: string): string {
  return html
    .replace(/<script[\s\S]*?<\/script>/gi, "")
    .replace(/<style[\s\S]*?<\/style>/gi, "")
    .replace(/<[^>]+>/g, "")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">");
}

function normalize(text: string): string {
  return text.replace(/[ \t]+/g, " ").replace(/\n{3,}/g, "\n\n").trim();
}

/** Returns a reason when `raw` is not an http(s) URL with a host. */
export function checkUrl(raw: string): string | null {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return `Invalid URL: ${raw}`;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return `Only http/https allowed, got '${url.protocol.replace(":", "")}'`;
  if (!url.hostname) return "Missing domain";
  return null;
}

function intArg(args: Record<string, unknown>, key: string, fallback: number): number {
  const v = args[key];
  return typeof v === "number" && Number.isFinite(v) ? Math.trunc(v) : fallback;
}

export interface WebSearchOptions {
  apiKey: string;
  maxResults: number;
}

export class WebSearchTool implements Tool {
  readonly name = "web_search";
  readonly description = "Search the web. Returns titles, URLs, and snippets.";
  readonly parameters = {
    type: "object",
    properties: {
      query: { type: "string", description: "Search query", minLength: 1 },
      count: { type: "integer", minimum: 1, maximum: 10, description: "Results (1-10)" },
    },
    required: ["query"],
  };

  constructor(private readonly options: WebSearchOptions) {}

  async execute(args: Record<string, unknown>): Promise<string> {
    const query = stringArg(args, "query") ?? "";
    const count = Math.min(Math.max(intArg(args, "count", this.options.maxResults), 1), 10);
    const key = this.options.apiKey || process.env.BRAVE_API_KEY || "";
    if (!key) return "Error: Brave Search API key not configured. Set tools.web.search.apiKey or BRAVE_API_KEY.";

    try {
      const url = new URL(BRAVE_SEARCH_URL);
      url.searchParams.set("q", query);
      url.searchParams.set("count", String(count));
      const res = await fetch(url, { headers: { Accept: "application/json", "X-Subscription-Token": key } });
      if (!res.ok) return `Error: search failed with status ${res.status}`;

      const parsed = BraveResultsSchema.safeParse(await res.json());
      if (!parsed.success) return "Error: unexpected search response";
      const results = (parsed.data.web?.results ?? []).slice(0, count);
      if (!results.length) return `No results for: ${query}`;

      const lines = [`Results for: ${query}`, ""];
      results.forEach((item, i) => {
        lines.push(`${i + 1}. ${item.title}`, `   ${item.url}`);
        if (item.description) lines.push(`   ${item.description}`);
      });
      return lines.join("\n");
    } catch (err) {
      return `Error: ${errorMessage(err)}`;
    }
  }
}

export class WebFetchTool implements Tool {
  readonly name = "web_fetch";
  readonly description = "Fetch a URL and extract readable content (HTML to text). Returns JSON with the text and fetch details.";
  readonly parameters = {
    type: "object",
    properties: {
      url: { type: "string", description: "URL to fetch" },
      extractMode: { type: "string", enum: ["markdown", "text"] },
      maxChars: { type: "integer", minimum: 100 },
    },
    required: ["url"],
  };

  constructor(private readonly maxChars = 50000) {}

  async execute(args: Record<string, unknown>): Promise<string> {
    const url = stringArg(args, "url") ?? "";
    const mode = stringArg(args, "extractMode") ?? "markdown";
    const maxChars = intArg(args, "maxChars", this.maxChars);
    const invalid = checkUrl(url);
    if (invalid) return JSON.stringify({ error: `URL validation failed: ${invalid}`, url });

    try {
      const res = await fetch(url, { redirect: "follow", headers: { "User-Agent": USER_AGENT } });
      const ctype = res.headers.get("content-type") ?? "";
      let text: string;
      let extractor = "raw";
      if (ctype.includes("application/json")) {
        text = JSON.stringify(await res.json(), null, 2);
        extractor = "json";
      } else {
        const raw = await res.text();
        if (ctype.includes("text/html") || /^\s*(<!doctype|<html)/i.test(raw.slice(0, 256))) {
          const stripped = stripTags(raw);
          text = mode === "text" ? stripped.trim() : normalize(stripped);
          extractor = "html";
        } else {
          text = raw;
        }
      }
      const truncated = text.length > maxChars;
      const body = truncated ? text.slice(0, maxChars) : text;
      return JSON.stringify({ url, finalUrl: res.url || url, status: res.status, extractor, truncated, length: body.length, text: body });
    } catch (err) {
      return JSON.stringify({ error: errorMessage(err), url });
    }
  }
}
