import path from "path";

/**
 * Directory holding package.json and config/, from both src/ and dist/
 */
export const PROJECT_ROOT = path.join(__dirname, "..", "..");

export const PATHS = {
  /**
   * Directory downloaded episodes are written to, relative to the working directory
   */
  downloads: "Downloads",

  /**
   * Series definitions file shipped with the project
   */
  seriesFile: path.join(PROJECT_ROOT, "config", "series.yaml"),
} as const;
