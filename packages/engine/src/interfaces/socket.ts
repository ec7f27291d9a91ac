/**
 * Abstract Socket Interfaces
 *
 * The connection loop only sees these, so the same engine runs on Node
 * sockets in production and on in-memory pairs under test.
 */

export interface ITcpSocket {
  /** Send data to the remote peer. */
  send(data: Uint8Array): void;

  /**
   * Send data and resolve when it has been accepted without backpressure.
   */
  sendAndWait?(data: Uint8Array): Promise<void>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Flush pending writes, then close the connection. */
  close(): void;

  /** Remote peer address. */
  remoteAddress?: string;

  /** Remote peer port. */
  remotePort?: number;
}

export interface ListenOptions {
  port: number;
  host?: string;
  /** Pending-connection queue length. */
  backlog?: number;
}

export interface ITcpServer {
  /** Start listening; `callback` runs once the socket is bound. */
  listen(options: ListenOptions, callback?: () => void): void;

  /** Get the address the server is listening on. */
  address(): { port: number } | null;

  /** Register a callback for incoming connections. */
  on(event: "connection", cb: (socket: unknown) => void): void;

  /** Register a callback for server errors. */
  on(event: "error", cb: (err: Error) => void): void;

  /** Stop accepting connections. */
  close(callback?: () => void): void;
}

export interface ISocketFactory {
  /** Create a TCP server. */
  createTcpServer(): ITcpServer;

  /** Wrap the platform socket a server hands to "connection" listeners. */
  wrapTcpSocket(socket: unknown): ITcpSocket;
}
