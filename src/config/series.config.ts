import fs from "fs";
import yaml from "js-yaml";
import { z } from "zod";
import type { SeriesPattern } from "../interfaces/episode.interface";
import { ConfigError, describeError } from "../errors";

const SeriesDefinitionSchema = z.object({
  name: z.string().trim().min(1),
  pattern: z.string().min(1),
  captureGroup: z.number().int().positive().optional(),
});

const SeriesFileSchema = z.object({
  series: z.array(SeriesDefinitionSchema).nonempty(),
});

export type SeriesDefinition = z.infer<typeof SeriesDefinitionSchema>;

/**
 * Series used when no series file is present
 */
export const DEFAULT_SERIES: readonly SeriesDefinition[] = [
  { name: "MAG", pattern: "MAG (\\d+)" },
  { name: "The Magnus Protocol", pattern: "The Magnus Protocol (\\d+)" },
];

/**
 * Compiles a definition into a case-insensitive pattern
 */
export function compileSeries(definition: SeriesDefinition): SeriesPattern {
  const captureGroup = definition.captureGroup ?? 1;
  if (!Number.isInteger(captureGroup) || captureGroup < 1) {
    throw new ConfigError(
      `Series "${definition.name}": captureGroup must be a positive integer`
    );
  }

  let pattern: RegExp;
  try {
    pattern = new RegExp(definition.pattern, "i");
  } catch (error) {
    throw new ConfigError(
      `Series "${definition.name}": invalid pattern ${definition.pattern} (${describeError(error)})`,
      { cause: error }
    );
  }

  return { name: definition.name, pattern, captureGroup };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}

/**
 * Parses series definitions from YAML text
 */
export function parseSeriesYaml(content: string): SeriesPattern[] {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Invalid series YAML: ${describeError(error)}`, {
      cause: error,
    });
  }

  const result = SeriesFileSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError(`Invalid series file: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }

  return result.data.series.map(compileSeries);
}

/**
 * Loads series from a YAML file, or the defaults when the file is absent
 */
export function loadSeries(filePath: string): SeriesPattern[] {
  if (!fs.existsSync(filePath)) {
    return DEFAULT_SERIES.map(compileSeries);
  }

  return parseSeriesYaml(fs.readFileSync(filePath, "utf-8"));
}

/**
 * Restricts series to the requested names (case-insensitive)
 */
export function selectSeries(
  series: SeriesPattern[],
  names: string[]
): SeriesPattern[] {
  if (names.length === 0) return series;

  const wanted = names.map((name) => name.toLowerCase());
  const unknown = names.filter(
    (name) => !series.some((s) => s.name.toLowerCase() === name.toLowerCase())
  );
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown series: ${unknown.join(", ")}. Available: ${series
        .map((s) => s.name)
        .join(", ")}`
    );
  }

  return series.filter((s) => wanted.includes(s.name.toLowerCase()));
}
