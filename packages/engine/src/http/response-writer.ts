import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { type HttpResponse, type LineEnding, STATUS_TEXT } from "./types.js";

export interface SerializeResponseOptions {
  /** Default: "\r\n". "\n" reproduces the legacy bare-LF framing. */
  lineEnding?: LineEnding;
}

export class UnsupportedStatusError extends Error {
  readonly code = "UNSUPPORTED_STATUS";

  constructor(readonly status: number) {
    super(`No reason phrase for status ${status}`);
    this.name = "UnsupportedStatusError";
  }
}

function isKnownStatus(status: number): status is keyof typeof STATUS_TEXT {
  return Object.hasOwn(STATUS_TEXT, status);
}

export function reasonPhrase(status: number): string {
  if (!isKnownStatus(status)) {
    throw new UnsupportedStatusError(status);
  }
  return STATUS_TEXT[status];
}

/**
 * Build the wire bytes for a response: status line, Content-Type,
 * Content-Length (in bytes), a blank line, then the body.
 */
export function serializeResponse(
  response: HttpResponse,
  options?: SerializeResponseOptions,
): Uint8Array {
  const eol = options?.lineEnding ?? "\r\n";
  const head = [
    `HTTP/1.1 ${response.status} ${reasonPhrase(response.status)}`,
    `Content-Type: ${response.contentType}`,
    `Content-Length: ${response.body.length}`,
    "",
    "",
  ].join(eol);
  return concat([fromString(head), response.body]);
}

/**
 * Serialize a response and write it to the socket. Resolves once the socket
 * has accepted the bytes when it supports drain-aware writes.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
  options?: SerializeResponseOptions,
): Promise<number> {
  const bytes = serializeResponse(response, options);
  if (socket.sendAndWait) {
    await socket.sendAndWait(bytes);
  } else {
    socket.send(bytes);
  }
  return bytes.length;
}
