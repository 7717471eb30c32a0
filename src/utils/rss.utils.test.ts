import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import { fetchFeed, parseRssFeed } from "./rss.utils";
import { compileSeries } from "../config/series.config";
import { TransportError } from "../errors";
import { buildFeed, startStubServer } from "../testing/feed-server";
import type { StubServer } from "../testing/feed-server";

const mag = compileSeries({ name: "MAG", pattern: "MAG (\\d+)" });
const protocol = compileSeries({
  name: "The Magnus Protocol",
  pattern: "The Magnus Protocol (\\d+)",
});

describe("parseRssFeed", () => {
  let mockConsoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    mockConsoleError = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    mockConsoleError.mockRestore();
  });

  it("extracts title, enclosure and number of matching items in feed order", () => {
    const xml = buildFeed([
      { title: "MAG 101", url: "https://cdn.test/101.mp3" },
      { title: "MAG 12", url: "https://cdn.test/12.mp3" },
      { title: "MAG 7", url: "https://cdn.test/7.mp3" },
    ]);

    expect(parseRssFeed(mag, xml)).toEqual([
      { name: "MAG 101", link: "https://cdn.test/101.mp3", episodeNumber: 101 },
      { name: "MAG 12", link: "https://cdn.test/12.mp3", episodeNumber: 12 },
      { name: "MAG 7", link: "https://cdn.test/7.mp3", episodeNumber: 7 },
    ]);
  });

  it("returns only the matching items", () => {
    const xml = buildFeed([
      { title: "MAG 1", url: "https://cdn.test/1.mp3" },
      { title: "Q&A livestream", url: "https://cdn.test/qa.mp3" },
      { title: "mag 5 bonus", url: "https://cdn.test/5.mp3" },
      { title: "MAG", url: "https://cdn.test/none.mp3" },
      { title: "MAG 2", url: "https://cdn.test/2.mp3" },
    ]);

    const episodes = parseRssFeed(mag, xml);

    expect(episodes).toHaveLength(3);
    expect(episodes.map((e) => e.episodeNumber)).toEqual([1, 5, 2]);
    expect(episodes.every((e) => e.episodeNumber >= 0)).toBe(true);
  });

  it("keeps titles with quotes and shell characters verbatim", () => {
    const xml = buildFeed([
      { title: 'MAG 9 "Quoted" $(echo hi) & more', url: "https://cdn.test/9.mp3" },
    ]);

    const [episode] = parseRssFeed(mag, xml);

    expect(episode.name).toBe('MAG 9 "Quoted" $(echo hi) & more');
  });

  it("uses an empty link when the item has no enclosure", () => {
    const xml = buildFeed([{ title: "MAG 3" }]);

    expect(parseRssFeed(mag, xml)).toEqual([
      { name: "MAG 3", link: "", episodeNumber: 3 },
    ]);
  });

  it("keeps the two series apart", () => {
    const xml = buildFeed([
      { title: "MAG 3", url: "https://cdn.test/mag-3.mp3" },
      { title: "The Magnus Protocol 1", url: "https://cdn.test/tmp-1.mp3" },
    ]);

    expect(parseRssFeed(mag, xml)).toEqual([
      { name: "MAG 3", link: "https://cdn.test/mag-3.mp3", episodeNumber: 3 },
    ]);
    expect(parseRssFeed(protocol, xml)).toEqual([
      {
        name: "The Magnus Protocol 1",
        link: "https://cdn.test/tmp-1.mp3",
        episodeNumber: 1,
      },
    ]);
  });

  it("returns an empty list for a feed without items", () => {
    expect(parseRssFeed(mag, buildFeed([]))).toEqual([]);
  });

  it("reports malformed XML and returns an empty list", () => {
    const episodes = parseRssFeed(mag, "<rss version=\"2.0\"><channel><item>");

    expect(episodes).toEqual([]);
    expect(mockConsoleError).toHaveBeenCalledWith(
      expect.stringContaining("Error parsing XML:")
    );
  });

  it("returns an empty list for text that is not XML", () => {
    expect(parseRssFeed(mag, "not a feed")).toEqual([]);
    expect(mockConsoleError).toHaveBeenCalledTimes(1);
  });

  it("reads items from an rss root without a version attribute", () => {
    const xml =
      '<rss><channel><item><title>MAG 1</title><enclosure url="a"/></item></channel></rss>';

    expect(parseRssFeed(mag, xml)).toEqual([
      { name: "MAG 1", link: "a", episodeNumber: 1 },
    ]);
    expect(mockConsoleError).not.toHaveBeenCalled();
  });

  it("ignores entries outside rss/channel/item", () => {
    const atom =
      '<?xml version="1.0" encoding="utf-8"?>' +
      '<feed xmlns="http://www.w3.org/2005/Atom">' +
      '<entry><title>MAG 4</title><link rel="enclosure" href="https://cdn.test/4.mp3"/></entry>' +
      "</feed>";

    expect(parseRssFeed(mag, atom)).toEqual([]);
    expect(mockConsoleError).not.toHaveBeenCalled();
  });

  it("reads items from every channel and the first enclosure of each", () => {
    const xml =
      "<rss><channel>" +
      '<item><title>MAG 2</title><enclosure url="https://cdn.test/2.mp3"/><enclosure url="https://cdn.test/2-alt.mp3"/></item>' +
      "</channel><channel>" +
      '<item><title><![CDATA[MAG 5 & friends]]></title><enclosure url="https://cdn.test/5.mp3"/></item>' +
      "</channel></rss>";

    expect(parseRssFeed(mag, xml)).toEqual([
      { name: "MAG 2", link: "https://cdn.test/2.mp3", episodeNumber: 2 },
      { name: "MAG 5 & friends", link: "https://cdn.test/5.mp3", episodeNumber: 5 },
    ]);
  });
});

describe("fetchFeed", () => {
  let server: StubServer;

  beforeEach(async () => {
    server = await startStubServer({
      "/feed.xml": {
        contentType: "application/rss+xml",
        body: "<rss>feed body</rss>",
      },
    });
  });

  afterEach(async () => {
    await server.close();
  });

  it("returns the response body as text", async () => {
    expect(await fetchFeed(server.url("/feed.xml"))).toBe("<rss>feed body</rss>");
  });

  it("throws a TransportError carrying the status on non-2xx", async () => {
    const failure = fetchFeed(server.url("/missing.xml"));

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrow("Status: 404");
  });
});
