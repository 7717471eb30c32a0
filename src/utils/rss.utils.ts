/**
 * Utilities for fetching the RSS feed and extracting series episodes
 */
import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { EpisodeInfo, SeriesPattern } from "../interfaces/episode.interface";
import { ParseError } from "../errors";
import { fetchText } from "./http.utils";
import { NO_EPISODE_NUMBER, extractEpisodeNumber } from "./episode-number.utils";

// Elements read as lists even when they occur once
const ARRAY_PATHS = new Set([
  "rss.channel",
  "rss.channel.item",
  "rss.channel.item.title",
  "rss.channel.item.enclosure",
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  isArray: (_name, jpath) => ARRAY_PATHS.has(jpath),
});

type XmlNode = Record<string, unknown>;

function asRecord(value: unknown): XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function asArray(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function extractText(value: unknown): string {
  const [first] = asArray(value);
  if (typeof first === "string") return first;
  if (typeof first === "number") return String(first);
  const text = asRecord(first)["#text"];
  return typeof text === "string" || typeof text === "number" ? String(text) : "";
}

/**
 * Fetches the raw feed document; throws TransportError on failure
 */
export async function fetchFeed(url: string): Promise<string> {
  return fetchText(url);
}

/**
 * Extracts the audio URL from the item's first enclosure
 */
export function extractEnclosureUrl(item: XmlNode): string {
  const [enclosure] = asArray(item.enclosure);
  const url = asRecord(enclosure)["@_url"];
  return typeof url === "string" ? url : "";
}

/**
 * Lists the <item> elements found at rss/channel/item.
 * Throws ParseError when the document is not well-formed XML.
 */
export function selectFeedItems(xmlData: string): XmlNode[] {
  const validation = XMLValidator.validate(xmlData);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ParseError(`${msg} (line ${line}, column ${col})`);
  }

  const rss = asRecord(asRecord(parser.parse(xmlData)).rss);
  return asArray(rss.channel).flatMap((channel) =>
    asArray(asRecord(channel).item).map(asRecord)
  );
}

/**
 * Returns the series episodes found in the feed, in feed order.
 * Items whose title does not match the series are left out.
 * Malformed XML is reported and yields an empty list.
 */
export function parseRssFeed(
  series: SeriesPattern,
  xmlData: string
): EpisodeInfo[] {
  let items: XmlNode[];
  try {
    items = selectFeedItems(xmlData);
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    console.error(`Error parsing XML: ${error.message}`);
    return [];
  }

  const episodes: EpisodeInfo[] = [];
  for (const item of items) {
    const name = extractText(item.title);
    const episodeNumber = extractEpisodeNumber(name, series);
    if (episodeNumber === NO_EPISODE_NUMBER) continue;

    episodes.push({ name, link: extractEnclosureUrl(item), episodeNumber });
  }

  return episodes;
}
