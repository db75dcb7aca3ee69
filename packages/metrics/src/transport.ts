import { gzipSync } from "node:zlib";
import { Agent, ProxyAgent, request, type Dispatcher } from "undici";
import {
  FIRST_UPDATE_PHRASE,
  USER_AGENT,
  getReportUrl,
  type ReportingConfig,
} from "@statbeacon/core";
import { createLogger } from "@statbeacon/logger";
import { DeliveryError } from "./errors.js";
import type { SubmitResult, Transport } from "./types.js";

const log = createLogger("metrics:transport");

/** Single-member gzip of the UTF-8 bytes of `text`. */
export function gzip(text: string): Buffer {
  return gzipSync(Buffer.from(text, "utf8"));
}

/** HTML form encoding: spaces become `+`, only `*-._` and alphanumerics stay literal. */
export function encodeFormComponent(text: string): string {
  return new URLSearchParams([["", text]]).toString().slice(1);
}

/** First line of a response body, or null when the body is empty. */
export function readFirstLine(body: string): string | null {
  if (body.length === 0) {
    return null;
  }
  const end = body.search(/\r\n|\r|\n/);
  return end === -1 ? body : body.slice(0, end);
}

/**
 * Classify the service's one-line answer.
 *
 * - missing line, `ERR…` or `7…`: rejected, thrown as DeliveryError
 * - `1` or the first-update phrase: accepted, plotters should reset
 * - anything else: accepted
 */
export function interpretResponse(line: string | null): SubmitResult {
  if (line === null) {
    throw new DeliveryError("null");
  }
  if (line.startsWith("ERR")) {
    throw new DeliveryError(line);
  }
  if (line.startsWith("7")) {
    throw new DeliveryError(line.slice(line.startsWith("7,") ? 2 : 1));
  }
  return {
    response: line,
    firstUpdate: line === "1" || line.includes(FIRST_UPDATE_PHRASE),
  };
}

export type HttpTransportOptions = Pick<
  ReportingConfig,
  "baseUrl" | "reportPath" | "requestTimeoutMs" | "bypassProxy"
> & {
  proxyUrl?: string;
  /** Log request sizes */
  debug?: boolean;
};

/**
 * POSTs gzip-compressed report documents with undici.
 *
 * With `proxyUrl` set the request is tunnelled through that proxy, unless
 * `bypassProxy` is on, which always connects directly, ignoring any proxy
 * the host installed as the global dispatcher.
 */
export class HttpTransport implements Transport {
  private readonly options: HttpTransportOptions;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: HttpTransportOptions) {
    this.options = options;
    if (options.bypassProxy) {
      this.dispatcher = new Agent();
    } else if (options.proxyUrl) {
      this.dispatcher = new ProxyAgent(options.proxyUrl);
    } else {
      this.dispatcher = undefined;
    }
  }

  getUrl(applicationName: string): string {
    return getReportUrl(
      encodeFormComponent(applicationName),
      this.options.baseUrl,
      this.options.reportPath,
    );
  }

  async submit(applicationName: string, document: string): Promise<SubmitResult> {
    const url = this.getUrl(applicationName);
    const compressed = gzip(document);

    if (this.options.debug) {
      log.info(
        `Prepared request for ${applicationName} uncompressed=${Buffer.byteLength(document)} compressed=${compressed.length}`,
      );
    }

    let statusCode: number;
    let text: string;
    try {
      const response = await request(url, {
        method: "POST",
        headers: {
          "User-Agent": USER_AGENT,
          "Content-Type": "application/json",
          "Content-Encoding": "gzip",
          "Content-Length": String(compressed.length),
          Accept: "application/json",
          Connection: "close",
        },
        body: compressed,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new DeliveryError(message, { cause: err });
    }

    if (statusCode >= 400) {
      throw new DeliveryError(`HTTP ${statusCode}`);
    }

    return interpretResponse(readFirstLine(text));
  }

  /** Release the connection pool this transport owns. */
  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}
