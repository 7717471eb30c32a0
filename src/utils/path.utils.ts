import path from "path";
import type { EpisodeInfo } from "../interfaces/episode.interface";

/**
 * Utilities for turning episode titles into download paths
 */

// Filesystems cap names at 255 bytes; this leaves room for " (n).mp3"
const MAX_BASENAME_BYTES = 240;

/**
 * Cuts text to at most maxBytes of UTF-8 without splitting a code point
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  let size = 0;
  let result = "";
  for (const char of text) {
    size += Buffer.byteLength(char, "utf8");
    if (size > maxBytes) break;
    result += char;
  }
  return result;
}

/**
 * Makes a title safe to use as a file name on common filesystems.
 * Whitespace runs collapse to one space, reserved and control characters
 * become "_", trailing dots are dropped and the result is capped at 240
 * bytes of UTF-8.
 * Examples: "MAG 1: Angler/Fish" -> "MAG 1_ Angler_Fish", "MAG 2..." -> "MAG 2"
 */
export function sanitizeFilename(title: string): string {
  const cleaned = title
    .replace(/\s+/g, " ")
    .replace(/[<>:"/\\|?*\u0000-\u001f\u007f]/g, "_")
    .trim();
  return truncateUtf8(cleaned, MAX_BASENAME_BYTES).replace(/[. ]+$/, "");
}

/**
 * Builds the download path for an episode: "<dir>/<title>.mp3".
 * Untitled episodes fall back to "episode-<number>.mp3".
 */
export function generateDownloadPath(
  episode: EpisodeInfo,
  downloadDir: string
): string {
  const baseName =
    sanitizeFilename(episode.name) || `episode-${episode.episodeNumber}`;
  return path.join(downloadDir, `${baseName}.mp3`);
}

/**
 * Returns filePath, or "name (2).mp3", "name (3).mp3"... when a previous
 * episode of the same run already claimed it. Records the returned path.
 */
export function claimUniquePath(filePath: string, claimed: Set<string>): string {
  const { dir, name, ext } = path.parse(filePath);

  let candidate = filePath;
  for (let copy = 2; claimed.has(candidate); copy++) {
    candidate = path.join(dir, `${name} (${copy})${ext}`);
  }

  claimed.add(candidate);
  return candidate;
}
