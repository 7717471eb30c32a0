import path from "path";
import dotenv from "dotenv";
import { PATHS } from "./paths.config";

// Load environment variables from .env file
dotenv.config();

export interface DownloaderConfig {
  downloadDir: string; // Absolute path
  seriesFile: string; // Absolute path
  taggerCommand: string;
}

export const TAGGER_CONFIG = {
  /**
   * Tagging tool invoked when TAGGER_COMMAND is not set
   */
  DEFAULT_COMMAND: "id3v2",
} as const;

/**
 * Resolves runtime settings from the environment, falling back to PATHS.
 * Relative DOWNLOAD_DIR and SERIES_FILE values resolve against cwd.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): DownloaderConfig {
  return {
    downloadDir: path.resolve(cwd, env.DOWNLOAD_DIR || PATHS.downloads),
    seriesFile: env.SERIES_FILE
      ? path.resolve(cwd, env.SERIES_FILE)
      : PATHS.seriesFile,
    taggerCommand: env.TAGGER_COMMAND || TAGGER_CONFIG.DEFAULT_COMMAND,
  };
}
