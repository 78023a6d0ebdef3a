import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { createServer, type Server } from "http";
import { HttpEventSource } from "./fetcher";

const LISTING_URL = "https://events.example.test/upcoming";

const listingHtml = `<html><head><script type="application/ld+json">${JSON.stringify({
  "@type": "ItemList",
  itemListElement: [
    { url: "https://events.example.test/en/event/1" },
    { url: "https://events.example.test/en/event/2" },
    { url: "https://events.example.test/en/event/3" },
  ],
})}</script></head></html>`;

function stubFetch(handler: (url: string) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) =>
    handler(String(input)),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("HttpEventSource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("lists event urls and honours maxEvents", async () => {
    const fetchMock = stubFetch(() => new Response(listingHtml, { status: 200 }));
    const source = new HttpEventSource({ eventsUrl: LISTING_URL });

    await expect(source.listEventReferences({ maxEvents: 2 })).resolves.toEqual([
      "https://events.example.test/en/event/1",
      "https://events.example.test/en/event/2",
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(LISTING_URL);
  });

  it("rejects when the listing is unavailable", async () => {
    stubFetch(() => new Response("oops", { status: 503 }));
    const source = new HttpEventSource({ eventsUrl: LISTING_URL });

    await expect(source.listEventReferences()).rejects.toThrow(
      `Listing fetch failed: HTTP 503 ${LISTING_URL}`,
    );
  });

  it("rejects when the listing has no event list", async () => {
    stubFetch(() => new Response("<html><title>Down</title></html>", { status: 200 }));
    const source = new HttpEventSource({ eventsUrl: LISTING_URL });

    await expect(source.listEventReferences()).rejects.toThrow(
      `Listing page has no event list: ${LISTING_URL}`,
    );
  });

  it("extracts an event from a detail page", async () => {
    stubFetch(
      () =>
        new Response(
          `<html><head><script type="application/ld+json">{"@type":"SportsEvent","name":"Cup","startDate":"2030-01-05T10:00:00Z"}</script></head></html>`,
          { status: 200 },
        ),
    );
    const source = new HttpEventSource();

    const result = await source.fetchEventDetail("https://events.example.test/en/event/77");

    expect(result).toMatchObject({
      kind: "event",
      method: "jsonld",
      event: { id: "77", name: "Cup", startDate: new Date("2030-01-05T10:00:00Z") },
    });
  });

  it("turns bad statuses and network errors into skips", async () => {
    stubFetch((url) => {
      if (url.endsWith("/1")) return new Response("gone", { status: 404 });
      throw new Error("socket hang up");
    });
    const source = new HttpEventSource();

    await expect(source.fetchEventDetail("https://events.example.test/en/event/1")).resolves.toEqual({
      kind: "skip",
      url: "https://events.example.test/en/event/1",
      reason: "HTTP 404",
    });
    await expect(source.fetchEventDetail("https://events.example.test/en/event/2")).resolves.toEqual({
      kind: "skip",
      url: "https://events.example.test/en/event/2",
      reason: "socket hang up",
    });
  });
});

describe("HttpEventSource against a stalling server", () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    server = createServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/html" });
      res.write("<html><head>");
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address !== "object") throw new Error("Failed to get server address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    vi.restoreAllMocks();
  });

  it("skips a detail page whose body never finishes", async () => {
    const source = new HttpEventSource({ timeoutMs: 100 });
    const url = `${baseUrl}/en/event/9`;

    const result = await source.fetchEventDetail(url);

    expect(result).toMatchObject({ kind: "skip", url });
  });

  it("rejects a listing whose body never finishes", async () => {
    const source = new HttpEventSource({ eventsUrl: `${baseUrl}/upcoming`, timeoutMs: 100 });

    await expect(source.listEventReferences()).rejects.toThrow();
  });
});
