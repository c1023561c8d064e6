import { Response } from "undici";
import { FetchFn, HttpRequestInit } from "../core/http";
import { Sink } from "../sink";
import { DownloadOutcome } from "../types";

export interface RecordedRequest {
  url: string;
  init: HttpRequestInit;
}

export type FakeRoute = (url: string) => Response | Promise<Response>;

export function createFakeFetch(route: FakeRoute): { fetchFn: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    requests.push({ url, init });
    return route(url);
  };
  return { fetchFn, requests };
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, { status, headers: { "content-type": "text/html; charset=utf-8" } });
}

export function wikitable(header: string[], rows: string[][], className = "wikitable sortable"): string {
  const head = `<tr>${header.map((cell) => `<th>${cell}</th>`).join("")}</tr>`;
  const body = rows.map((row) => `<tr>${row.map((cell) => `<td>${cell}</td>`).join("")}</tr>`).join("");
  return `<table class="${className}"><tbody>${head}${body}</tbody></table>`;
}

export function page(...tables: string[]): string {
  return `<!DOCTYPE html><html><head><title>List</title></head><body>${tables.join("\n")}</body></html>`;
}

export class MemorySink implements Sink {
  readonly outcomes: DownloadOutcome[] = [];

  async publishDownloadOutcomes(outcomes: DownloadOutcome[]): Promise<void> {
    this.outcomes.push(...outcomes);
  }
}
