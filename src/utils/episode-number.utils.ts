/**
 * Utilities for extracting and ordering episode numbers
 */
import type { EpisodeInfo, SeriesPattern } from "../interfaces/episode.interface";

/**
 * Sentinel for titles that do not belong to the series
 */
export const NO_EPISODE_NUMBER = -1;

/**
 * Extracts the episode number of a title using the series pattern.
 * The pattern is searched anywhere in the title; the capture must be a
 * plain base-10 number, anything else counts as no match.
 * Examples with "MAG (\d+)": "MAG 101" -> 101, "mag 5 bonus" -> 5, "MAG" -> -1
 */
export function extractEpisodeNumber(
  title: string,
  series: SeriesPattern
): number {
  const match = series.pattern.exec(title);
  if (!match) return NO_EPISODE_NUMBER;

  const captured = match[series.captureGroup];
  if (captured === undefined || !/^\d+$/.test(captured)) {
    return NO_EPISODE_NUMBER;
  }

  const num = parseInt(captured, 10);
  return Number.isSafeInteger(num) ? num : NO_EPISODE_NUMBER;
}

/**
 * Sorts episodes ascending by episode number.
 * Returns a new array; equal numbers keep their feed order.
 */
export function sortEpisodes(episodes: readonly EpisodeInfo[]): EpisodeInfo[] {
  return [...episodes].sort((a, b) => a.episodeNumber - b.episodeNumber);
}
