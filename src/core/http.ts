import { Agent, Dispatcher, fetch, Response } from "undici";
import { AppConfig } from "../config";
import { HttpClientError, HttpError } from "./errors";

export interface HttpRequestInit {
  method: "GET";
  headers: Record<string, string>;
  dispatcher?: Dispatcher;
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<Response>;

interface HttpClientOptions {
  fetchFn?: FetchFn;
}

/**
 * Thin wrapper over undici's fetch that pins the user agent and dispatcher
 * for every request. One attempt per call, no timeout beyond undici's own.
 */
export class HttpClient {
  private readonly userAgent: string;
  private readonly dispatcher: Dispatcher;
  private readonly fetchFn: FetchFn;

  constructor(userAgent: string, dispatcher: Dispatcher, fetchFn: FetchFn = fetch) {
    this.userAgent = userAgent;
    this.dispatcher = dispatcher;
    this.fetchFn = fetchFn;
  }

  /** Resolves with any response, whatever its status; rejects only on transport failure. */
  async get(url: string, accept = "*/*"): Promise<Response> {
    try {
      return await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.userAgent,
          accept,
        },
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      throw new HttpError("transport", url, { cause: error });
    }
  }

  async getText(url: string): Promise<string> {
    const response = await this.get(url, "text/html,application/xhtml+xml");
    if (!response.ok) {
      await discardBody(response);
      throw new HttpError("status", url, { status: response.status });
    }

    try {
      return await response.text();
    } catch (error) {
      throw new HttpError("transport", url, { cause: error });
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

export function createHttpClient(config: AppConfig, options: HttpClientOptions = {}): HttpClient {
  let dispatcher: Dispatcher;
  try {
    dispatcher = new Agent(config.ignoreHttpsErrors ? { connect: { rejectUnauthorized: false } } : {});
  } catch (error) {
    throw new HttpClientError(error);
  }
  return new HttpClient(config.userAgent, dispatcher, options.fetchFn);
}
