/**
 * Command line parsing for the episode fetcher
 */

export interface CliOptions {
  feedUrl: string;
  outputDir: string | null;
  seriesNames: string[];
  checkOnly: boolean;
  showHelp: boolean;
  warnings: string[]; // Arguments that were not understood
}

export const USAGE = [
  "Usage: episode-fetcher <patreon-rss-url> [options]",
  "Options:",
  "  --output <dir>     Download directory (default: Downloads)",
  "  --series <name>    Only process the named series (repeatable)",
  "  --check            List matching episodes without downloading",
  "  -h, --help         Show this help",
].join("\n");

function takesValue(value: string | undefined): value is string {
  return value !== undefined && !value.startsWith("-");
}

/**
 * Parse command line arguments from an array.
 * Unknown options, options missing their value and extra positionals are
 * skipped and reported in `warnings`.
 */
export function parseArgs(args: string[]): CliOptions {
  let feedUrl = "";
  let outputDir: string | null = null;
  const seriesNames: string[] = [];
  let checkOnly = false;
  let showHelp = false;
  const warnings: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];

    if (arg === "--help" || arg === "-h") {
      showHelp = true;
    } else if (arg === "--check") {
      checkOnly = true;
    } else if (arg === "--output" || arg === "--series") {
      if (!takesValue(value)) {
        warnings.push(`${arg} needs a value`);
        continue;
      }
      if (arg === "--output") {
        outputDir = value;
      } else {
        seriesNames.push(value);
      }
      i++;
    } else if (arg.startsWith("-")) {
      warnings.push(`Unknown option: ${arg}`);
    } else if (!feedUrl) {
      feedUrl = arg;
    } else {
      warnings.push(`Ignoring extra argument: ${arg}`);
    }
  }

  return { feedUrl, outputDir, seriesNames, checkOnly, showHelp, warnings };
}
