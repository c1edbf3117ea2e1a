import { jest } from "@jest/globals";

jest.mock("undici", () => ({
  ...jest.requireActual<typeof import("undici")>("undici"),
  fetch: jest.fn(),
}));

import { fetch, Response } from "undici";
import { FeedClient, looksLikeFeed, stripMarkup } from "../src/client/feeds.js";
import { getLogger } from "../src/util/logger.js";

const mockFetch = jest.mocked(fetch);

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
<channel>
<title>Transport jobs</title>
<link>https://jobs.example.com</link>
<description>Listings</description>
<item>
<title>NEMT Driver - Wheelchair Van</title>
<link>https://jobs.example.com/1</link>
<description>&lt;p&gt;Drive &lt;b&gt;patients&lt;/b&gt;
to appointments&lt;/p&gt;</description>
<pubDate>Mon, 13 Jan 2025 10:00:00 GMT</pubDate>
</item>
<item>
<title>Office Manager</title>
<link>https://jobs.example.com/2</link>
<description>Front desk work</description>
</item>
<item>
<title>Courier Driver - pay to apply</title>
<link>https://jobs.example.com/3</link>
<description>Deliveries</description>
</item>
<item>
<title>Courier without a link</title>
<description>Deliveries</description>
</item>
</channel>
</rss>`;

function feedResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "application/rss+xml" } });
}

describe("stripMarkup", () => {
  it("removes tags and collapses whitespace", () => {
    expect(stripMarkup("<p>Drive <b>patients</b>\n\n to   visits</p>")).toBe("Drive patients to visits");
    expect(stripMarkup(undefined)).toBe("");
  });
});

describe("looksLikeFeed", () => {
  it("accepts RSS, Atom and XML prologs", () => {
    expect(looksLikeFeed(RSS)).toBe(true);
    expect(looksLikeFeed('  <feed xmlns="http://www.w3.org/2005/Atom">')).toBe(true);
    expect(looksLikeFeed("<rss><channel></channel></rss>")).toBe(true);
  });

  it("rejects HTML pages", () => {
    expect(looksLikeFeed("<!DOCTYPE html><html><body>Blocked</body></html>")).toBe(false);
  });
});

describe("FeedClient", () => {
  const sleep = jest.fn(async (_ms: number) => undefined);

  function makeClient(delayMs = 0): FeedClient {
    return new FeedClient(
      {
        category: "indeed",
        keywords: ["nemt", "courier", "wheelchair"],
        excludeKeywords: ["pay to apply"],
        delayMs,
        timeoutMs: 1000,
        sleep,
      },
      getLogger()
    );
  }

  beforeEach(() => {
    mockFetch.mockReset();
    sleep.mockClear();
  });

  it("parses items and strips their markup", async () => {
    mockFetch.mockResolvedValueOnce(feedResponse(RSS));
    const items = await makeClient().fetchFeed("https://feeds.example.com/a");
    expect(items).toHaveLength(4);
    expect(items[0]).toEqual({
      title: "NEMT Driver - Wheelchair Van",
      link: "https://jobs.example.com/1",
      description: "Drive patients to appointments",
      pubDate: "2025-01-13T10:00:00.000Z",
      author: "",
      feedUrl: "https://feeds.example.com/a",
    });
  });

  it("keeps matching items, dropping excluded, unmatched, linkless and repeated ones", async () => {
    mockFetch.mockResolvedValueOnce(feedResponse(RSS)).mockResolvedValueOnce(feedResponse(RSS));
    const items = await makeClient().fetchAll([
      "https://feeds.example.com/a",
      "https://feeds.example.com/b",
    ]);
    expect(items.map((i) => i.link)).toEqual(["https://jobs.example.com/1"]);
    expect(items[0].feedUrl).toBe("https://feeds.example.com/a");
  });

  it("skips feeds that fail or return a web page", async () => {
    mockFetch
      .mockResolvedValueOnce(new Response("busy", { status: 503, statusText: "Service Unavailable" }))
      .mockResolvedValueOnce(
        new Response("<!DOCTYPE html><html><body>Are you a robot?</body></html>", {
          status: 200,
          headers: { "content-type": "text/html" },
        })
      )
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValueOnce(feedResponse(RSS));

    const items = await makeClient().fetchAll([
      "https://feeds.example.com/a",
      "https://feeds.example.com/b",
      "https://feeds.example.com/c",
      "https://feeds.example.com/d",
    ]);

    expect(items.map((i) => i.feedUrl)).toEqual(["https://feeds.example.com/d"]);
  });

  it("rejects a non-feed body with its content type", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response("<html></html>", { status: 200, headers: { "content-type": "text/html" } })
    );
    await expect(makeClient().fetchFeed("https://feeds.example.com/a")).rejects.toThrow(
      "Response is not a feed (content-type: text/html)"
    );
  });

  it("spaces out requests to the same source", async () => {
    mockFetch.mockImplementation(async () => feedResponse(RSS));
    await makeClient(2000).fetchAll(["https://feeds.example.com/a", "https://feeds.example.com/b"]);

    expect(sleep).toHaveBeenCalledTimes(1);
    const [waited] = sleep.mock.calls[0];
    expect(waited).toBeGreaterThan(0);
    expect(waited).toBeLessThanOrEqual(2000);
  });
});
