import { execFileSync } from "child_process";
import type { EpisodeInfo } from "../interfaces/episode.interface";
import { ExternalToolError, describeError } from "../errors";
import { TAGGER_CONFIG } from "../config/downloader.config";

/**
 * Arguments passed to the tagging tool (id3v2 syntax)
 */
export function buildTagArguments(
  filePath: string,
  episode: EpisodeInfo
): string[] {
  return [
    "--track",
    String(episode.episodeNumber),
    "--song",
    episode.name,
    filePath,
  ];
}

/**
 * Writes the track number and title into the file's tags.
 * The tool runs without a shell so titles are passed through verbatim.
 * Throws ExternalToolError when the tool cannot run or exits non-zero.
 */
export function tagTrack(
  filePath: string,
  episode: EpisodeInfo,
  command: string = TAGGER_CONFIG.DEFAULT_COMMAND
): void {
  try {
    execFileSync(command, buildTagArguments(filePath, episode), {
      stdio: ["ignore", "ignore", "pipe"],
    });
  } catch (error) {
    throw new ExternalToolError(`${command} failed: ${describeError(error)}`, {
      cause: error,
    });
  }
}
