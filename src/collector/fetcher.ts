import { TextDecoder } from "util";
import { TransportError, errorMessage } from "../shared/errors.js";

export type FetchResponse = {
  statusCode: number;
  body: Uint8Array;
  contentType: string | null;
};

export interface Fetcher {
  fetch(url: string): Promise<FetchResponse>;
}

export type HttpFetcherOptions = {
  timeoutMs: number;
  userAgent: string;
};

/** One GET per call; a network failure or timeout is a TransportError, a non-2xx status is returned as-is. */
export class HttpFetcher implements Fetcher {
  constructor(private readonly options: HttpFetcherOptions) {}

  async fetch(url: string): Promise<FetchResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "text/html"
        },
        signal: controller.signal,
        redirect: "follow"
      });
      const body = new Uint8Array(await response.arrayBuffer());
      return {
        statusCode: response.status,
        body,
        contentType: response.headers.get("content-type")
      };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransportError(url, `Request timed out after ${this.options.timeoutMs}ms`, { cause: error });
      }
      throw new TransportError(url, `Download request failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

const charsetPattern = /charset\s*=\s*["']?([\w-]+)/i;

const sniffCharset = (body: Uint8Array): string | null => {
  const head = new TextDecoder("latin1").decode(body.subarray(0, 2048));
  const meta = head.match(/<meta[^>]*>/gi) ?? [];
  for (const tag of meta) {
    const match = tag.match(charsetPattern);
    if (match) return match[1];
  }
  return null;
};

// Windows code page names the WHATWG encoding registry does not list.
const CHARSET_ALIASES: Record<string, string> = {
  ms950: "big5",
  cp950: "big5",
  "windows-950": "big5"
};

const makeDecoder = (charset: string | null): TextDecoder | null => {
  if (!charset) return null;
  const label = charset.toLowerCase();
  try {
    return new TextDecoder(CHARSET_ALIASES[label] ?? label);
  } catch {
    return null;
  }
};

/** The listing pages are served in Big5 (MS950); the charset is read from the header, then the markup. */
export const decodeBody = (body: Uint8Array, contentType: string | null): string => {
  const fromHeader = contentType?.match(charsetPattern)?.[1] ?? null;
  const decoder = makeDecoder(fromHeader) ?? makeDecoder(sniffCharset(body)) ?? new TextDecoder("utf-8");
  return decoder.decode(body);
};
