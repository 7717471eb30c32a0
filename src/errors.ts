/**
 * Error types raised while fetching, parsing, downloading and tagging episodes
 */

export class EpisodeFetcherError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network failure (DNS, connection, TLS or a non-2xx response)
 */
export class TransportError extends EpisodeFetcherError {}

/**
 * Feed document could not be parsed as RSS
 */
export class ParseError extends EpisodeFetcherError {}

/**
 * Destination file could not be opened or written
 */
export class FileIOError extends EpisodeFetcherError {}

/**
 * Tagging tool exited non-zero or could not be started
 */
export class ExternalToolError extends EpisodeFetcherError {}

/**
 * Invalid series definitions or command line selection
 */
export class ConfigError extends EpisodeFetcherError {}

/**
 * Extracts a printable message from anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
