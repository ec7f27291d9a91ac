import { decodeToString } from "../utils/buffer.js";
import type { HttpRequest } from "./types.js";

export type HttpRequestParseErrorCode =
  | "IDLE_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "EMPTY_REQUEST"
  | "MALFORMED_REQUEST_LINE"
  | "MALFORMED_HEADER";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

interface RequestLines {
  requestLine: string;
  headerLines: string[];
  bodyLines: string[];
}

function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split("\n");
  // A terminating \n closes the last line rather than opening a new one.
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

function isHeadTerminator(line: string): boolean {
  return line === "\r" || line === "";
}

function splitRequest(text: string): RequestLines {
  const lines = splitLines(text);
  const requestLine = lines[0] ?? "";

  let index = 1;
  const headerLines: string[] = [];
  while (index < lines.length && !isHeadTerminator(lines[index])) {
    headerLines.push(lines[index]);
    index++;
  }

  // Skip the blank separator itself.
  const bodyLines = lines.slice(index + 1);
  return { requestLine, headerLines, bodyLines };
}

function tokenizeRequestLine(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === "" ? [] : trimmed.split(/\s+/);
}

/**
 * Header value rule: skip the character after the colon (normally the
 * space) and drop the final character of the line (normally the \r).
 * Headers written as `Name:value` or terminated by a bare \n lose a
 * character at either end. Kept for compatibility with existing clients.
 */
function headerValue(line: string, colonIdx: number): string {
  return line.slice(colonIdx + 2, line.length - 1);
}

function buildRequest(lines: RequestLines): HttpRequest {
  const [method = "", path = "", httpVersion = ""] = tokenizeRequestLine(
    lines.requestLine,
  );

  const headers = new Map<string, string>();
  for (const line of lines.headerLines) {
    const colonIdx = line.indexOf(":");
    if (colonIdx === -1) continue;
    headers.set(line.substring(0, colonIdx), headerValue(line, colonIdx));
  }

  let body = "";
  for (const line of lines.bodyLines) {
    body += `${line}\n`;
  }

  return { method, path, httpVersion, headers, body };
}

function toText(raw: Uint8Array | string): string {
  return typeof raw === "string" ? raw : decodeToString(raw);
}

/**
 * Parse one request from a raw buffer without validating it.
 *
 * Never throws: a short request line leaves the missing fields empty and
 * header lines without a colon are ignored. The body is everything after the
 * blank separator line, regardless of any Content-Length header.
 */
export function parseHttpRequest(raw: Uint8Array | string): HttpRequest {
  return buildRequest(splitRequest(toText(raw)));
}

/**
 * Parse one request and reject anything the lenient parser would have
 * patched over. Header values follow the same rule as `parseHttpRequest`.
 */
export function parseHttpRequestStrict(raw: Uint8Array | string): HttpRequest {
  const text = toText(raw);
  if (text.trim() === "") {
    throw new HttpRequestParseError("EMPTY_REQUEST", "Empty request");
  }

  const lines = splitRequest(text);
  const tokens = tokenizeRequestLine(lines.requestLine);
  if (tokens.length !== 3) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Malformed request line: expected 3 fields, got ${tokens.length}`,
    );
  }

  const [, path, httpVersion] = tokens;
  if (!path.startsWith("/")) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Malformed request line: path must start with "/": ${path}`,
    );
  }
  if (!httpVersion.startsWith("HTTP/")) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Malformed request line: unknown protocol version: ${httpVersion}`,
    );
  }

  for (const line of lines.headerLines) {
    if (line.indexOf(":") <= 0) {
      throw new HttpRequestParseError(
        "MALFORMED_HEADER",
        `Malformed header line: ${line.trimEnd()}`,
      );
    }
  }

  return buildRequest(lines);
}
