/**
 * TCP connection to the warehouse host.
 *
 * One `Session` per socket: it owns the receive accumulator, the outbound
 * queue and the stop flag. The manager only ever holds the current session;
 * a new `connect()` stops and joins the previous one first.
 *
 * Lifecycle:  idle → connecting → connected → disconnecting → idle
 *             connecting → idle on failure (status "error" is published)
 */

import net from "node:net";
import { ConnectError, StreamError, ValidationError } from "./errors.js";
import { EventChannel, errorEvent, statusEvent, type Handshake } from "./events.js";
import { FrameAssembler, MAX_BUFFER_BYTES } from "./framing.js";
import { decode, type DecodedTelegram } from "./telegram.js";

export type ConnectionState = "idle" | "connecting" | "connected" | "disconnecting";

export interface Endpoint {
  host: string;
  port: number;
}

export interface OutboundFrame {
  bytes: Buffer;
  handshake?: Handshake;
}

/** Where the simulation engine pushes outbound telegrams. */
export interface TelegramSink {
  send(frame: OutboundFrame): boolean;
}

export interface ConnectionOptions {
  connectTimeoutMs: number;
  /** Upper bound on waiting for a stopped socket to close. */
  joinTimeoutMs: number;
  maxBufferBytes: number;
  createSocket: (endpoint: Endpoint) => net.Socket;
}

const DEFAULT_OPTIONS: ConnectionOptions = {
  connectTimeoutMs: 5000,
  joinTimeoutMs: 3000,
  maxBufferBytes: MAX_BUFFER_BYTES,
  createSocket: ({ host, port }) => net.createConnection({ host, port }),
};

/**
 * Validates a host/port pair. Numeric strings are accepted for the port.
 * @throws ValidationError
 */
export function parseEndpoint(host: unknown, port: unknown): Endpoint {
  if (typeof host !== "string" || host.trim() === "") {
    throw new ValidationError("Host cannot be empty");
  }

  const value = typeof port === "string" && /^\s*\d+\s*$/.test(port) ? Number(port) : port;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > 65535) {
    throw new ValidationError("Port must be an integer between 1 and 65535");
  }

  return { host: host.trim(), port: value };
}

export class ConnectionManager implements TelegramSink {
  private readonly options: ConnectionOptions;
  private current: Session | null = null;
  private lastEpoch = 0;
  /** Bumped by every connect() and disconnect(); a call that sees it move on was superseded. */
  private generation = 0;
  private _state: ConnectionState = "idle";

  constructor(
    private readonly channel: EventChannel,
    options: Partial<ConnectionOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Epoch of the live session, 0 when there is none. */
  get epoch(): number {
    return this.current?.epoch ?? 0;
  }

  get endpoint(): Endpoint | null {
    return this.current?.endpoint ?? null;
  }

  isConnected(): boolean {
    return this._state === "connected";
  }

  /**
   * Opens a new session. Resolves true once connected; false when the
   * endpoint is invalid, the connect fails, or the attempt is superseded.
   * Every outcome is also published on the channel.
   */
  async connect(host: unknown, port: unknown): Promise<boolean> {
    let endpoint: Endpoint;
    try {
      endpoint = parseEndpoint(host, port);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      this.channel.publish(errorEvent(0, "validation", err.message));
      return false;
    }

    const gen = ++this.generation;
    // another caller may install a session while this one waits
    while (this.current) {
      await this.stopCurrent();
      if (gen !== this.generation) return false;
    }
    // nothing from an earlier session may reach consumers of this one
    this.channel.purge();

    const session = new Session(++this.lastEpoch, endpoint, this.channel, this.options, (s) =>
      this.onSessionClosed(s)
    );
    this.current = session;
    this._state = "connecting";
    this.channel.publish(statusEvent(session.epoch, "connecting"));

    try {
      await session.open();
    } catch (err) {
      if (this.current !== session) return false;
      this.current = null;
      this._state = "idle";
      const message = err instanceof Error ? err.message : String(err);
      this.channel.publish(statusEvent(session.epoch, "error"));
      this.channel.publish(errorEvent(session.epoch, "connect", message));
      return false;
    }

    if (this.current !== session) return false;
    this._state = "connected";
    this.channel.publish(statusEvent(session.epoch, "connected"));
    return true;
  }

  /**
   * Stops the current session and waits for its socket to close.
   * Idempotent: a second call, or a call with no session, does nothing.
   */
  async disconnect(): Promise<void> {
    // cancels a connect() still waiting on the previous session
    this.generation++;
    await this.stopCurrent();
  }

  private async stopCurrent(): Promise<void> {
    const session = this.current;
    if (!session) return;

    if (!session.stopRequested) {
      if (session.established) this._state = "disconnecting";
      session.stop();
    }
    await session.join(this.options.joinTimeoutMs);
  }

  send(frame: OutboundFrame): boolean {
    const session = this.current;
    if (!session || !session.established || !session.active) {
      this.channel.publish(errorEvent(this.epoch, "validation", "Not connected"));
      return false;
    }
    session.enqueue(frame);
    return true;
  }

  private onSessionClosed(session: Session): void {
    if (this.current !== session) return;
    // a failed connect attempt is reported by connect() itself
    if (!session.established && !session.stopRequested) return;
    this.current = null;
    this._state = "idle";
    this.channel.publish(statusEvent(session.epoch, "disconnected"));
  }
}

class Session {
  established = false;
  stopRequested = false;

  private socket: net.Socket | null = null;
  private readonly assembler: FrameAssembler;
  private readonly outbound: OutboundFrame[] = [];
  private blocked = false;
  private finished = false;
  private readonly closed: Promise<void>;
  private resolveClosed: () => void = () => {};

  constructor(
    readonly epoch: number,
    readonly endpoint: Endpoint,
    private readonly channel: EventChannel,
    private readonly options: ConnectionOptions,
    private readonly onClosed: (session: Session) => void
  ) {
    this.assembler = new FrameAssembler(options.maxBufferBytes);
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  open(): Promise<void> {
    const { host, port } = this.endpoint;
    const timeoutMs = this.options.connectTimeoutMs;

    return new Promise<void>((resolve, reject) => {
      const socket = this.options.createSocket(this.endpoint);
      this.socket = socket;
      // registered first: every exit path ends here exactly once
      socket.once("close", () => this.finish());

      const timer = setTimeout(() => {
        fail(new ConnectError(`Connection to ${host}:${port} timed out after ${timeoutMs} ms`));
      }, timeoutMs);

      const cleanup = () => {
        clearTimeout(timer);
        socket.off("connect", onConnect);
        socket.off("error", onError);
        socket.off("close", onEarlyClose);
      };

      const fail = (err: ConnectError) => {
        cleanup();
        socket.destroy();
        reject(err);
      };

      const onConnect = () => {
        cleanup();
        if (!this.active) {
          reject(new ConnectError(`Connection to ${host}:${port} cancelled`));
          return;
        }
        this.established = true;
        this.attach(socket);
        resolve();
      };

      const onError = (err: Error) => {
        fail(new ConnectError(err.message, { cause: err }));
      };

      const onEarlyClose = () => {
        fail(new ConnectError(`Connection to ${host}:${port} closed before it was established`));
      };

      socket.once("connect", onConnect);
      socket.once("error", onError);
      socket.once("close", onEarlyClose);
    });
  }

  enqueue(frame: OutboundFrame): void {
    this.outbound.push(frame);
    this.drainOutbound();
  }

  /** False once a stop was requested or the socket closed. */
  get active(): boolean {
    return !this.stopRequested && !this.finished;
  }

  /** Sets the stop flag and aborts the socket. */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.outbound.length = 0;

    const socket = this.socket;
    if (!socket) {
      this.finish();
      return;
    }
    try {
      // RST rather than FIN: unblocks the peer immediately
      socket.resetAndDestroy();
    } catch (err) {
      console.warn(`[!] Abortive shutdown failed for ${this.endpoint.host}:${this.endpoint.port}:`, err);
    } finally {
      socket.destroy();
    }
  }

  /** Resolves once the socket has closed, or forces teardown after `timeoutMs`. */
  async join(timeoutMs: number): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), timeoutMs);
    });
    const expired = await Promise.race([this.closed.then(() => false), timedOut]);
    clearTimeout(timer);
    if (expired) {
      console.warn(`[!] Session ${this.epoch} did not close within ${timeoutMs} ms, forcing teardown`);
      this.finish();
    }
  }

  // ── Receive path ────────────────────────────────────────────────────────────

  private attach(socket: net.Socket): void {
    socket.setNoDelay(true);

    socket.on("data", (chunk: Buffer) => {
      if (!this.active) return;

      const { frames, discarded } = this.assembler.push(chunk);
      if (discarded > 0) {
        this.channel.publish(
          errorEvent(this.epoch, "overflow", `Receive buffer overflow, discarded ${discarded} bytes`)
        );
      }
      for (const frame of frames) {
        this.publishRecv(frame);
      }
    });

    socket.on("error", (err) => {
      if (!this.active) return;
      const error = new StreamError(err.message, { cause: err });
      this.channel.publish(errorEvent(this.epoch, "stream", error.message));
    });

    socket.on("drain", () => {
      this.blocked = false;
      this.drainOutbound();
    });
  }

  private publishRecv(frame: Buffer): void {
    const decoded = decode(frame);
    if (!decoded) return;
    this.channel.publish({
      type: "recv",
      telegram: decoded.telegram,
      outcome: decoded.status,
      issues: issuesOf(decoded),
      bytes: frame,
      session: this.epoch,
      at: new Date(),
    });
  }

  // ── Send path ───────────────────────────────────────────────────────────────

  private drainOutbound(): void {
    const socket = this.socket;
    if (!socket || !this.established) return;

    while (this.active && !this.blocked) {
      const frame = this.outbound.shift();
      if (!frame) return;

      const accepted = socket.write(frame.bytes, (err) => {
        // failures surface through the socket's "error" event
        if (err || !this.active) return;
        this.publishSent(frame);
      });
      if (!accepted) this.blocked = true;
    }
  }

  private publishSent(frame: OutboundFrame): void {
    const decoded = decode(frame.bytes);
    if (!decoded) return;
    this.channel.publish({
      type: "sent",
      telegram: decoded.telegram,
      bytes: frame.bytes,
      handshake: frame.handshake ?? "",
      session: this.epoch,
      at: new Date(),
    });
  }

  // ── Teardown ────────────────────────────────────────────────────────────────

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.outbound.length = 0;
    // a trailing partial frame is never emitted
    this.assembler.reset();
    if (this.socket && !this.socket.destroyed) this.socket.destroy();
    this.socket = null;
    this.resolveClosed();
    this.onClosed(this);
  }
}

function issuesOf(decoded: DecodedTelegram): string[] {
  return decoded.status === "recovered" ? decoded.issues : [];
}
