import { describe, expect, it } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import { parseHttpRequest } from "./request-parser.js";
import {
  expectedRequestLength,
  HttpRequestReader,
  readRawRequest,
} from "./request-reader.js";

/** Create a mock socket that delivers chunks on a timer and optionally closes. */
function scriptedSocket(
  chunks: string[],
  options: { close?: boolean; error?: Error } = {},
): ITcpSocket {
  let dataCallback: ((data: Uint8Array) => void) | null = null;
  let closeCallback: ((hadError: boolean) => void) | null = null;
  let errorCallback: ((err: Error) => void) | null = null;
  const endAt = chunks.length * 5 + 10;

  return {
    send() {},
    onData(cb) {
      dataCallback = cb;
      let delay = 0;
      for (const chunk of chunks) {
        const c = chunk;
        setTimeout(() => dataCallback?.(fromString(c)), delay);
        delay += 5;
      }
    },
    onClose(cb) {
      closeCallback = cb;
      if (options.close) {
        setTimeout(() => closeCallback?.(false), endAt);
      }
    },
    onError(cb) {
      errorCallback = cb;
      const error = options.error;
      if (error) {
        setTimeout(() => errorCallback?.(error), endAt);
      }
    },
    close() {},
  };
}

describe("expectedRequestLength", () => {
  it("is null until the blank line arrives", () => {
    expect(expectedRequestLength(fromString("GET / HTTP/1.1\r\nHost: x\r\n"))).toBeNull();
  });

  it("covers the head when there is no Content-Length", () => {
    expect(expectedRequestLength(fromString("GET / HTTP/1.1\r\n\r\n"))).toBe(18);
  });

  it("adds the declared body length", () => {
    const head = "POST / HTTP/1.1\r\ncontent-length: 4\r\n\r\n";
    expect(expectedRequestLength(fromString(head))).toBe(head.length + 4);
  });

  it("recognizes a bare LF separator", () => {
    expect(expectedRequestLength(fromString("GET / HTTP/1.1\n\nrest"))).toBe(16);
  });
});

describe("HttpRequestReader", () => {
  it("resolves as soon as the head is complete", async () => {
    const raw = "GET / HTTP/1.1\r\nHost: x\r\n\r\n";
    const result = await readRawRequest(scriptedSocket([raw]));

    expect(decodeToString(result.bytes)).toBe(raw);
    expect(result.truncated).toBe(false);
  });

  it("assembles a request delivered in several chunks", async () => {
    const result = await readRawRequest(
      scriptedSocket(["GET /test", "/get HTTP/1.1\r\nHo", "st: x\r\n\r\n"]),
    );
    expect(decodeToString(result.bytes)).toBe(
      "GET /test/get HTTP/1.1\r\nHost: x\r\n\r\n",
    );
  });

  it("waits for the declared body bytes", async () => {
    const result = await readRawRequest(
      scriptedSocket([
        "POST /test/post HTTP/1.1\r\nContent-Length: 11\r\n\r\nhello",
        " world",
      ]),
    );
    expect(decodeToString(result.bytes)).toBe(
      "POST /test/post HTTP/1.1\r\nContent-Length: 11\r\n\r\nhello world",
    );
  });

  it("keeps body bytes that arrive with a head without Content-Length", async () => {
    const raw = "POST /test/post HTTP/1.1\r\nHost: x\r\n\r\nhello";
    const result = await readRawRequest(scriptedSocket([raw]));

    expect(decodeToString(result.bytes)).toBe(raw);
    expect(parseHttpRequest(result.bytes).body).toBe("hello\n");
  });

  it("keeps body bytes beyond the declared Content-Length", async () => {
    const raw = "POST /test/post HTTP/1.1\r\nContent-Length: 2\r\n\r\nhello";
    const result = await readRawRequest(scriptedSocket([raw]));

    expect(result.truncated).toBe(false);
    expect(parseHttpRequest(result.bytes).body).toBe("hello\n");
  });

  it("caps a complete request whose extra body overflows the buffer", async () => {
    const raw = "POST / HTTP/1.1\r\nContent-Length: 1\r\n\r\nabcdef";
    const result = await readRawRequest(scriptedSocket([raw]), {
      maxBytes: 40,
    });

    expect(result.truncated).toBe(true);
    expect(decodeToString(result.bytes)).toBe(raw.slice(0, 40));
  });

  it("cuts a request at exactly the buffer cap", async () => {
    const head = "POST /test/post HTTP/1.1\r\nContent-Length: 500\r\n\r\n";
    const body = "x".repeat(500);
    const result = await readRawRequest(scriptedSocket([head + body]), {
      maxBytes: 100,
    });

    expect(result.truncated).toBe(true);
    expect(result.bytes.length).toBe(100);
    expect(decodeToString(result.bytes)).toBe((head + body).slice(0, 100));
  });

  it("keeps a request of exactly the cap intact", async () => {
    const raw = "GET / HTTP/1.1\r\n\r\n";
    const result = await readRawRequest(scriptedSocket([raw]), {
      maxBytes: raw.length,
    });

    expect(result.truncated).toBe(false);
    expect(result.bytes.length).toBe(raw.length);
  });

  it("truncates at 3000 bytes by default", async () => {
    const head = "POST / HTTP/1.1\r\nContent-Length: 5000\r\n\r\n";
    const result = await readRawRequest(
      scriptedSocket([head + "y".repeat(5000)]),
    );

    expect(result.truncated).toBe(true);
    expect(result.bytes.length).toBe(3000);
  });

  it("returns what arrived when the peer closes early", async () => {
    const result = await readRawRequest(
      scriptedSocket(["GET / HTTP/1.1\r\nHost"], { close: true }),
    );

    expect(decodeToString(result.bytes)).toBe("GET / HTTP/1.1\r\nHost");
    expect(result.truncated).toBe(false);
  });

  it("returns partial data when the request times out", async () => {
    const result = await readRawRequest(scriptedSocket(["GET / HTTP/1.1"]), {
      timeoutMs: 30,
    });
    expect(decodeToString(result.bytes)).toBe("GET / HTTP/1.1");
  });

  it("rejects a connection closed before any data", async () => {
    await expect(
      readRawRequest(scriptedSocket([], { close: true })),
    ).rejects.toMatchObject({ code: "CONNECTION_CLOSED" });
  });

  it("times out idle connections", async () => {
    const socket: ITcpSocket = {
      send() {},
      onData() {},
      onClose() {},
      onError() {},
      close() {},
    };

    await expect(
      new HttpRequestReader(socket).read({ timeoutMs: 20 }),
    ).rejects.toMatchObject({
      code: "IDLE_TIMEOUT",
    });
  });

  it("rethrows socket errors", async () => {
    const failure = new Error("connection reset");
    await expect(
      readRawRequest(scriptedSocket(["GET /"], { error: failure })),
    ).rejects.toBe(failure);
  });
});
