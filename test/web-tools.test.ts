import { afterEach, describe, expect, test, vi } from "vitest";
import { WebFetchTool, WebSearchTool, checkUrl } from "../src/agent/tools/web.js";

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
});

describe("web_search", () => {
  test("reports a missing api key without calling out", async () => {
    vi.stubEnv("BRAVE_API_KEY", "");
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const result = await new WebSearchTool({ apiKey: "", maxResults: 5 }).execute({ query: "node" });
    expect(result).toBe("Error: Brave Search API key not configured. Set tools.web.search.apiKey or BRAVE_API_KEY.");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test("formats results and sends the key and count", async () => {
    const body = {
      web: {
        results: [
          { title: "Node.js", url: "https://nodejs.org", description: "JavaScript runtime" },
          { title: "npm", url: "https://npmjs.com" },
        ],
      },
    };
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => Response.json(body));
    vi.stubGlobal("fetch", fetchMock);

    const result = await new WebSearchTool({ apiKey: "test-key", maxResults: 5 }).execute({ query: "node", count: 2 });

    expect(result).toBe("Results for: node\n\n1. Node.js\n   https://nodejs.org\n   JavaScript runtime\n2. npm\n   https://npmjs.com");
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe("https://api.search.brave.com/res/v1/web/search?q=node&count=2");
    expect(init?.headers).toEqual({ Accept: "application/json", "X-Subscription-Token": "test-key" });
  });

  test("an empty result set says so", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => Response.json({ web: { results: [] } })));
    expect(await new WebSearchTool({ apiKey: "test-key", maxResults: 5 }).execute({ query: "zzz" })).toBe("No results for: zzz");
  });

  test("a failed request is error text", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("", { status: 429 })));
    expect(await new WebSearchTool({ apiKey: "test-key", maxResults: 5 }).execute({ query: "q" })).toBe("Error: search failed with status 429");
  });
});

describe("web_fetch", () => {
  test("rejects non-http urls before fetching", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const result = JSON.parse(await new WebFetchTool().execute({ url: "file:///etc/passwd" }));
    expect(result).toEqual({ error: "URL validation failed: Only http/https allowed, got 'file'", url: "file:///etc/passwd" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test("reduces html to text", async () => {
    const html = "<html><head><style>p{}</style><script>x()</script></head><body><p>Hello   there</p></body></html>";
    vi.stubGlobal("fetch", vi.fn(async () => new Response(html, { status: 200, headers: { "content-type": "text/html" } })));
    const result = JSON.parse(await new WebFetchTool().execute({ url: "https://example.com" }));
    expect(result).toMatchObject({ url: "https://example.com", status: 200, extractor: "html", truncated: false, text: "Hello there" });
  });

  test("pretty prints json and truncates to maxChars", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => Response.json({ a: 1 })));
    const result = JSON.parse(await new WebFetchTool(5).execute({ url: "https://example.com/data" }));
    expect(result).toMatchObject({ extractor: "json", truncated: true, length: 5, text: "{\n  \"" });
  });

  test("network failures come back in the envelope", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => { throw new Error("getaddrinfo ENOTFOUND"); }));
    const result = JSON.parse(await new WebFetchTool().execute({ url: "https://nowhere.invalid" }));
    expect(result).toEqual({ error: "getaddrinfo ENOTFOUND", url: "https://nowhere.invalid" });
  });

  test("url checks", () => {
    expect(checkUrl("https://example.com")).toBeNull();
    expect(checkUrl("not a url")).toBe("Invalid URL: not a url");
  });
});
