/**
 * Interface representing a numbered episode matched in the RSS feed
 */
export interface EpisodeInfo {
  readonly name: string; // Item title, exactly as in the feed
  readonly link: string; // Enclosure URL of the audio file
  readonly episodeNumber: number; // Parsed from the title, -1 when the title does not match
}

/**
 * A series selected from the feed by matching item titles
 */
export interface SeriesPattern {
  name: string;
  pattern: RegExp; // Compiled case-insensitive
  captureGroup: number; // Group holding the episode number
}

/**
 * Result of processing one episode
 */
export type DownloadOutcome =
  | "downloaded"
  | "transport-failed"
  | "file-failed"
  | "tag-failed";
