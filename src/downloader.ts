import fs from "fs";
import path from "path";
import { once } from "events";
import type { Readable } from "stream";
import type {
  DownloadOutcome,
  EpisodeInfo,
  SeriesPattern,
} from "./interfaces/episode.interface";
import { FileIOError, TransportError, describeError } from "./errors";
import { loadConfig } from "./config/downloader.config";
import { loadSeries, selectSeries } from "./config/series.config";
import { fetchFeed, parseRssFeed } from "./utils/rss.utils";
import { sortEpisodes } from "./utils/episode-number.utils";
import { claimUniquePath, generateDownloadPath } from "./utils/path.utils";
import { fetchStream } from "./utils/http.utils";
import { tagTrack } from "./utils/tag.utils";
import { USAGE, parseArgs } from "./utils/args.utils";

const DIVIDER = "----------------------";

export interface DownloadContext {
  downloadDir: string;
  taggerCommand: string;
  claimedPaths: Set<string>; // Paths written during this run
}

/**
 * Opens the destination file, failing before anything is fetched
 */
async function openDestination(filePath: string): Promise<fs.WriteStream> {
  const writer = fs.createWriteStream(filePath);
  try {
    await once(writer, "open");
  } catch (error) {
    throw new FileIOError(
      `Error opening file for writing: ${filePath} (${describeError(error)})`,
      { cause: error }
    );
  }
  return writer;
}

/**
 * Pipes the response into the file; rejects with whichever side failed first
 */
function writeStream(source: Readable, writer: fs.WriteStream): Promise<void> {
  return new Promise((resolve, reject) => {
    source.on("error", (err: Error) => {
      reject(new TransportError(describeError(err), { cause: err }));
    });
    writer.on("error", (err: Error) => {
      reject(
        new FileIOError(`Error writing file: ${describeError(err)}`, {
          cause: err,
        })
      );
    });
    writer.on("finish", resolve);
    source.pipe(writer);
  });
}

/**
 * Downloads one episode to "<downloadDir>/<title>.mp3" and tags it.
 * Failures are reported and returned as an outcome, never thrown.
 */
export async function downloadEpisode(
  episode: EpisodeInfo,
  context: DownloadContext
): Promise<DownloadOutcome> {
  const filePath = claimUniquePath(
    generateDownloadPath(episode, context.downloadDir),
    context.claimedPaths
  );

  let writer: fs.WriteStream;
  try {
    writer = await openDestination(filePath);
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    return "file-failed";
  }

  console.log(`⬇️  Downloading: ${episode.name}`);

  let source: Readable | undefined;
  try {
    source = await fetchStream(episode.link);
    await writeStream(source, writer);
  } catch (error) {
    source?.destroy();
    writer.destroy();
    // Clean up partially downloaded file
    await fs.promises.rm(filePath, { force: true });

    if (error instanceof FileIOError) {
      console.error(`❌ ${error.message}`);
      return "file-failed";
    }
    console.error(
      `❌ Failed to download ${episode.name}. ${describeError(error)}`
    );
    return "transport-failed";
  }

  console.log(`✅ Downloaded: ${filePath}`);

  try {
    tagTrack(filePath, episode, context.taggerCommand);
  } catch (error) {
    console.error(`❌ Error setting track number. ${describeError(error)}`);
    return "tag-failed";
  }

  console.log("Track number set successfully.");
  return "downloaded";
}

/**
 * Prints and downloads episodes one at a time, in the given order
 */
export async function downloadSeries(
  episodes: EpisodeInfo[],
  context: DownloadContext
): Promise<DownloadOutcome[]> {
  const outcomes: DownloadOutcome[] = [];

  for (const episode of episodes) {
    console.log(`Title: ${episode.name}`);
    console.log(`Link: ${episode.link}`);
    console.log(`Episode Number: ${episode.episodeNumber}`);
    outcomes.push(await downloadEpisode(episode, context));
    console.log(DIVIDER);
  }

  return outcomes;
}

/**
 * Parses and sorts the episodes of one series from the fetched feed
 */
export function collectSeriesEpisodes(
  series: SeriesPattern,
  xmlData: string
): EpisodeInfo[] {
  return sortEpisodes(parseRssFeed(series, xmlData));
}

function printSummary(outcomes: DownloadOutcome[]): void {
  const count = (outcome: DownloadOutcome) =>
    outcomes.filter((o) => o === outcome).length;

  console.log(`\n📊 Summary:`);
  console.log(`   • Episodes processed: ${outcomes.length}`);
  console.log(`   • Downloaded and tagged: ${count("downloaded")}`);
  if (count("transport-failed") > 0) {
    console.log(`   • Download errors: ${count("transport-failed")}`);
  }
  if (count("file-failed") > 0) {
    console.log(`   • File errors: ${count("file-failed")}`);
  }
  if (count("tag-failed") > 0) {
    console.log(`   • Tagging errors: ${count("tag-failed")}`);
  }
}

/**
 * Runs the whole fetch → parse → sort → download → tag pass.
 * Resolves with the process exit code.
 */
export async function main(
  args: string[] = process.argv.slice(2)
): Promise<number> {
  const options = parseArgs(args);

  for (const warning of options.warnings) {
    console.warn(`⚠️  ${warning}`);
  }

  if (options.showHelp) {
    console.log(USAGE);
    return 0;
  }

  if (!options.feedUrl) {
    console.error("Error: add your Patreon RSS feed URL.");
    console.error(USAGE);
    return 1;
  }

  const config = loadConfig();
  const downloadDir = options.outputDir
    ? path.resolve(options.outputDir)
    : config.downloadDir;

  let seriesList: SeriesPattern[];
  try {
    seriesList = selectSeries(
      loadSeries(config.seriesFile),
      options.seriesNames
    );
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    return 1;
  }

  if (!options.checkOnly) {
    fs.mkdirSync(downloadDir, { recursive: true });
  }

  let xmlData: string;
  try {
    console.log(`🔄 Fetching podcast feed from: ${options.feedUrl}`);
    xmlData = await fetchFeed(options.feedUrl);
  } catch (error) {
    console.error(`❌ Error fetching feed: ${describeError(error)}`);
    return 1;
  }

  const context: DownloadContext = {
    downloadDir,
    taggerCommand: config.taggerCommand,
    claimedPaths: new Set<string>(),
  };
  const outcomes: DownloadOutcome[] = [];

  for (const series of seriesList) {
    const episodes = collectSeriesEpisodes(series, xmlData);
    console.log(`\n✅ Found ${episodes.length} ${series.name} episodes`);

    if (options.checkOnly) {
      for (const episode of episodes) {
        console.log(`- ${episode.episodeNumber}: ${episode.name}`);
      }
      continue;
    }

    outcomes.push(...(await downloadSeries(episodes, context)));
  }

  if (!options.checkOnly) {
    printSummary(outcomes);
  }
  return 0;
}
