import axios from "axios";
import type { Readable } from "stream";
import { TransportError, describeError } from "../errors";

/**
 * Describes an axios failure the way it is shown to the operator
 */
export function describeTransportError(error: unknown): string {
  if (axios.isAxiosError(error) && error.response) {
    return `Status: ${error.response.status}`;
  }
  return describeError(error);
}

/**
 * GETs a URL and returns the body as text
 */
export async function fetchText(url: string): Promise<string> {
  try {
    const response = await axios.get<string>(url, {
      responseType: "text",
      transformResponse: (data: string) => data,
    });
    return response.data;
  } catch (error) {
    throw new TransportError(describeTransportError(error), { cause: error });
  }
}

/**
 * GETs a URL and returns the body as a stream
 */
export async function fetchStream(url: string): Promise<Readable> {
  try {
    const response = await axios.get<Readable>(url, {
      responseType: "stream",
    });
    return response.data;
  } catch (error) {
    throw new TransportError(describeTransportError(error), { cause: error });
  }
}
