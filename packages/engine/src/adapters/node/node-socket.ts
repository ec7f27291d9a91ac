import * as net from "node:net";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ListenOptions,
} from "../../interfaces/socket.js";

export class NodeTcpSocket implements ITcpSocket {
  constructor(private readonly socket: net.Socket) {}

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get remotePort(): number | undefined {
    return this.socket.remotePort;
  }

  send(data: Uint8Array): void {
    if (this.socket.destroyed || !this.socket.writable) {
      return;
    }
    this.socket.write(data);
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new Error("Socket is not writable"));
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      const done = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      };

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(err);
      };

      const onDrain = () => done();
      const onClose = () => fail(new Error("Socket closed during write"));
      const onError = (err: Error) => fail(err);

      const cleanup = () => {
        this.socket.off("drain", onDrain);
        this.socket.off("close", onClose);
        this.socket.off("error", onError);
      };

      this.socket.once("close", onClose);
      this.socket.once("error", onError);

      try {
        const accepted = this.socket.write(data);
        if (accepted) {
          done();
        } else {
          this.socket.once("drain", onDrain);
        }
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.socket.on("data", (data: Buffer) => {
      cb(new Uint8Array(data));
    });
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.socket.on("close", cb);
  }

  onError(cb: (err: Error) => void): void {
    this.socket.on("error", cb);
  }

  close(): void {
    if (this.socket.destroyed) return;
    // end() flushes queued writes; destroy once they are out.
    this.socket.end(() => this.socket.destroy());
  }
}

export class NodeTcpServer implements ITcpServer {
  private server: net.Server = net.createServer();

  listen(options: ListenOptions, callback?: () => void): void {
    this.server.listen(
      { port: options.port, host: options.host, backlog: options.backlog },
      callback,
    );
  }

  address(): { port: number } | null {
    const addr = this.server.address();
    if (addr && typeof addr === "object" && "port" in addr) {
      return { port: addr.port };
    }
    return null;
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    ...args:
      | [event: "connection", cb: (socket: unknown) => void]
      | [event: "error", cb: (err: Error) => void]
  ): void {
    if (args[0] === "connection") {
      this.server.on("connection", args[1]);
      return;
    }
    this.server.on("error", args[1]);
  }

  close(callback?: () => void): void {
    this.server.close(() => callback?.());
  }
}

export class NodeSocketFactory implements ISocketFactory {
  createTcpServer(): ITcpServer {
    return new NodeTcpServer();
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof net.Socket)) {
      throw new Error("Expected a Node net.Socket");
    }
    return new NodeTcpSocket(socket);
  }
}
