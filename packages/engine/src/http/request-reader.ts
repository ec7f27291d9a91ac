import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, findSequence } from "../utils/buffer.js";
import { HttpRequestParseError } from "./request-parser.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const LF_LF = new Uint8Array([10, 10]); // \n\n
export const DEFAULT_READ_BUFFER_SIZE = 3000;
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface ReadRequestOptions {
  /** Hard cap on the bytes kept for one request. Default: 3000 */
  maxBytes?: number;
  timeoutMs?: number;
}

export interface RawRequest {
  bytes: Uint8Array;
  /** The request reached `maxBytes` before it was complete. */
  truncated: boolean;
}

function findHeadEnd(buffer: Uint8Array): number {
  const crlf = findSequence(buffer, CRLF_CRLF);
  const lf = findSequence(buffer, LF_LF);
  if (crlf === -1) return lf === -1 ? -1 : lf + LF_LF.length;
  if (lf === -1 || crlf < lf) return crlf + CRLF_CRLF.length;
  return lf + LF_LF.length;
}

function declaredContentLength(head: string): number {
  const match = /^content-length:[ \t]*(\d+)[ \t]*\r?$/im.exec(head);
  if (!match) return 0;
  const length = Number.parseInt(match[1], 10);
  return Number.isNaN(length) ? 0 : length;
}

/**
 * Total byte length of the request in `buffer` once its head is complete,
 * or null while the blank separator line has not arrived yet.
 */
export function expectedRequestLength(buffer: Uint8Array): number | null {
  const headEnd = findHeadEnd(buffer);
  if (headEnd === -1) return null;
  const head = decodeToString(buffer.subarray(0, headEnd));
  return headEnd + declaredContentLength(head);
}

/**
 * Buffers the bytes of a single request as they arrive on a socket.
 */
export class HttpRequestReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  /**
   * Resolve with everything buffered once the head and any declared body
   * have arrived, the buffer cap is hit, the peer closes, or the timeout expires
   * with data already buffered.
   */
  async read(options?: ReadRequestOptions): Promise<RawRequest> {
    const maxBytes = options?.maxBytes ?? DEFAULT_READ_BUFFER_SIZE;
    const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    while (true) {
      const expected = expectedRequestLength(this.buffer);
      if (
        expected !== null &&
        expected <= maxBytes &&
        this.buffer.length >= expected
      ) {
        // Content-Length only ends the wait; the parser gets every byte
        // that arrived, up to the cap.
        return {
          bytes: this.buffer.slice(0, Math.min(this.buffer.length, maxBytes)),
          truncated: this.buffer.length > maxBytes,
        };
      }

      if (this.buffer.length >= maxBytes) {
        return { bytes: this.buffer.slice(0, maxBytes), truncated: true };
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.closed) {
        if (this.buffer.length === 0) {
          throw new HttpRequestParseError(
            "CONNECTION_CLOSED",
            "Connection closed before any data arrived",
          );
        }
        return { bytes: this.buffer.slice(), truncated: false };
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (this.buffer.length === 0) {
          throw new HttpRequestParseError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }
        return { bytes: this.buffer.slice(), truncated: false };
      }
    }
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

/** Read the raw bytes of one request from a socket. */
export function readRawRequest(
  socket: ITcpSocket,
  options?: ReadRequestOptions,
): Promise<RawRequest> {
  return new HttpRequestReader(socket).read(options);
}
