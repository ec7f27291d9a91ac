import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ListenOptions,
} from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";

export class InMemoryTcpSocket implements ITcpSocket {
  remoteAddress?: string;
  remotePort?: number;

  private peer: InMemoryTcpSocket | null = null;
  private closed = false;
  private dataCallbacks: Array<(data: Uint8Array) => void> = [];
  private closeCallbacks: Array<(hadError: boolean) => void> = [];

  static createPair(): [InMemoryTcpSocket, InMemoryTcpSocket] {
    const a = new InMemoryTcpSocket();
    const b = new InMemoryTcpSocket();
    a.peer = b;
    b.peer = a;
    a.remoteAddress = "in-memory";
    b.remoteAddress = "in-memory";
    a.remotePort = 1;
    b.remotePort = 2;
    return [a, b];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(data: Uint8Array): void {
    if (this.closed || !this.peer || this.peer.closed) {
      return;
    }

    const copy = data.slice();
    queueMicrotask(() => {
      this.peer?.emitData(copy);
    });
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    this.send(data);
    return Promise.resolve();
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.dataCallbacks.push(cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.closeCallbacks.push(cb);
  }

  // In-process pairs only ever close; they have no error path.
  onError(_cb: (err: Error) => void): void {}

  close(): void {
    this.closeInternal(false);
  }

  private emitData(data: Uint8Array): void {
    if (this.closed) return;
    for (const cb of this.dataCallbacks) {
      cb(data);
    }
  }

  private closeInternal(fromPeer: boolean): void {
    if (this.closed) return;
    this.closed = true;

    for (const cb of this.closeCallbacks) {
      cb(false);
    }

    if (!fromPeer && this.peer) {
      this.peer.closeInternal(true);
    }
  }
}

class InMemoryTcpServer implements ITcpServer {
  private listening = false;
  private port: number | null = null;
  private connectionCallbacks: Array<(socket: unknown) => void> = [];
  private errorCallbacks: Array<(err: Error) => void> = [];
  lastListenOptions: ListenOptions | null = null;

  constructor(
    private readonly allocatePort: () => number,
    private readonly listenError: Error | null,
  ) {}

  listen(options: ListenOptions, callback?: () => void): void {
    this.lastListenOptions = options;
    const listenError = this.listenError;
    if (listenError) {
      queueMicrotask(() => this.emitError(listenError));
      return;
    }
    this.port = options.port === 0 ? this.allocatePort() : options.port;
    this.listening = true;
    queueMicrotask(() => callback?.());
  }

  address(): { port: number } | null {
    if (!this.listening || this.port === null) {
      return null;
    }
    return { port: this.port };
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    ...args:
      | [event: "connection", cb: (socket: unknown) => void]
      | [event: "error", cb: (err: Error) => void]
  ): void {
    if (args[0] === "connection") {
      this.connectionCallbacks.push(args[1]);
      return;
    }
    this.errorCallbacks.push(args[1]);
  }

  close(callback?: () => void): void {
    this.listening = false;
    this.port = null;
    queueMicrotask(() => callback?.());
  }

  isListening(): boolean {
    return this.listening;
  }

  emitError(err: Error): void {
    for (const cb of this.errorCallbacks) {
      cb(err);
    }
  }

  accept(socket: unknown): void {
    if (!this.listening) {
      throw new Error("In-memory server is not listening");
    }
    for (const cb of this.connectionCallbacks) {
      cb(socket);
    }
  }
}

export interface InMemorySocketFactoryOptions {
  /** Make every `listen` fail with this error, as a bind failure would. */
  listenError?: Error;
}

export interface InMemoryRequestOptions {
  /** Delay between chunks when the payload is split. Default: 5ms */
  chunkDelayMs?: number;
  /** Give up waiting for the server to close. Default: 1000ms */
  timeoutMs?: number;
}

/**
 * Socket factory whose server accepts in-process socket pairs, plus a client
 * helper that sends a raw request and collects everything written back until
 * the server closes the connection.
 */
export class InMemorySocketFactory implements ISocketFactory {
  private nextPort = 41000;
  private server: InMemoryTcpServer | null = null;

  constructor(private readonly options: InMemorySocketFactoryOptions = {}) {}

  createTcpServer(): ITcpServer {
    const server = new InMemoryTcpServer(
      () => this.nextPort++,
      this.options.listenError ?? null,
    );
    this.server = server;
    return server;
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof InMemoryTcpSocket)) {
      throw new Error("Expected an InMemoryTcpSocket instance");
    }
    return socket;
  }

  /** Options passed to the most recent `listen` call. */
  get listenOptions(): ListenOptions | null {
    return this.server?.lastListenOptions ?? null;
  }

  /** Hand the server something that is not a socket of this factory. */
  acceptForeign(value: unknown): void {
    this.listeningServer().accept(value);
  }

  /** Raise a server-level error after listening. */
  emitServerError(err: Error): void {
    this.listeningServer().emitError(err);
  }

  /**
   * Open a connection to the server and return the client end without
   * sending anything.
   */
  connect(): InMemoryTcpSocket {
    const [clientSocket, serverSocket] = InMemoryTcpSocket.createPair();
    this.listeningServer().accept(serverSocket);
    return clientSocket;
  }

  request(
    rawHttp: string | Uint8Array,
    options?: InMemoryRequestOptions,
  ): Promise<Uint8Array> {
    return this.requestInChunks([rawHttp], options);
  }

  requestInChunks(
    chunks: Array<string | Uint8Array>,
    options?: InMemoryRequestOptions,
  ): Promise<Uint8Array> {
    const server = this.listeningServer();
    const payloads = chunks.map((chunk) =>
      typeof chunk === "string" ? fromString(chunk) : chunk,
    );
    const chunkDelayMs = options?.chunkDelayMs ?? 5;
    const [clientSocket, serverSocket] = InMemoryTcpSocket.createPair();

    return new Promise((resolve, reject) => {
      const received: Uint8Array[] = [];
      let done = false;

      const timeout = setTimeout(() => {
        if (done) return;
        done = true;
        reject(new Error("Timed out waiting for in-memory response"));
      }, options?.timeoutMs ?? 1000);

      const finish = () => {
        if (done) return;
        done = true;
        clearTimeout(timeout);
        resolve(concat(received));
      };

      const fail = (err: Error) => {
        if (done) return;
        done = true;
        clearTimeout(timeout);
        reject(err);
      };

      clientSocket.onData((data) => {
        received.push(data.slice());
      });
      clientSocket.onClose(() => finish());
      clientSocket.onError((err) => fail(err));

      try {
        server.accept(serverSocket);
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
        return;
      }

      payloads.forEach((payload, index) => {
        if (index === 0) {
          queueMicrotask(() => clientSocket.send(payload));
        } else {
          setTimeout(() => clientSocket.send(payload), index * chunkDelayMs);
        }
      });
    });
  }

  private listeningServer(): InMemoryTcpServer {
    if (!this.server || !this.server.isListening()) {
      throw new Error("In-memory server is not listening");
    }
    return this.server;
  }
}
