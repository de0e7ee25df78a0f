/**
 * Stand-in for the warehouse host: accepts the device's TCP connection,
 * records the telegrams it sends and lets the caller push bytes back.
 */

import net from "node:net";
import { FrameAssembler } from "./framing.js";
import { decode, type Telegram } from "./telegram.js";

export interface MockHostOptions {
  host?: string;
  /** 0 picks a free port. */
  port?: number;
  onTelegram?: (telegram: Telegram) => void;
  quiet?: boolean;
}

export class MockHost {
  readonly received: Telegram[] = [];
  private readonly server: net.Server;
  private client: net.Socket | null = null;
  private readonly assembler = new FrameAssembler();
  private waiters: Array<() => void> = [];

  constructor(private readonly options: MockHostOptions = {}) {
    this.server = net.createServer((socket) => this.accept(socket));
  }

  /** Resolves with the bound port. */
  listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(this.options.port ?? 0, this.options.host ?? "127.0.0.1", () => {
        this.server.off("error", reject);
        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("Mock host is not bound to a TCP port"));
          return;
        }
        this.log(`[*] Mock host listening on ${address.address}:${address.port}`);
        resolve(address.port);
      });
    });
  }

  get connected(): boolean {
    return this.client !== null && !this.client.destroyed;
  }

  /** Writes raw bytes to the connected device. */
  write(bytes: Uint8Array): Promise<void> {
    const client = this.client;
    if (!client || client.destroyed) {
      return Promise.reject(new Error("No device connected"));
    }
    return new Promise((resolve, reject) => {
      client.write(bytes, (err) => (err ? reject(err) : resolve()));
    });
  }

  /** Half-closes the device connection (orderly FIN). */
  endClient(): void {
    this.client?.end();
  }

  /** Resolves once a device is connected. */
  waitForClient(timeoutMs = 2000): Promise<void> {
    return this.waitUntil(() => this.connected, timeoutMs, "device connection");
  }

  /** Resolves once `count` telegrams have been received in total. */
  waitForTelegrams(count: number, timeoutMs = 2000): Promise<Telegram[]> {
    return this.waitUntil(() => this.received.length >= count, timeoutMs, `${count} telegram(s)`).then(
      () => this.received.slice(0, count)
    );
  }

  close(): Promise<void> {
    this.client?.destroy();
    this.client = null;
    if (!this.server.listening) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private accept(socket: net.Socket): void {
    if (this.connected) {
      this.log(`[!] Rejecting second device connection from ${socket.remoteAddress ?? "unknown"}`);
      socket.destroy();
      return;
    }
    this.client = socket;
    this.assembler.reset();
    this.log(`[+] Device connected from ${socket.remoteAddress ?? "unknown"}`);
    this.notify();

    socket.on("data", (chunk: Buffer) => {
      for (const frame of this.assembler.push(chunk).frames) {
        const decoded = decode(frame);
        if (!decoded) continue;
        this.received.push(decoded.telegram);
        this.log(`[←] ${decoded.telegram.code} #${decoded.telegram.sequence} ${decoded.telegram.data.trim()}`);
        this.options.onTelegram?.(decoded.telegram);
      }
      this.notify();
    });

    socket.on("close", () => {
      if (this.client === socket) this.client = null;
      this.log("[-] Device disconnected");
      this.notify();
    });

    socket.on("error", (err) => {
      this.log(`[✗] Device socket error: ${err.message}`);
    });
  }

  private waitUntil(done: () => boolean, timeoutMs: number, what: string): Promise<void> {
    if (done()) return Promise.resolve();
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== check);
        reject(new Error(`Timed out waiting for ${what}`));
      }, timeoutMs);
      const check = () => {
        if (!done()) return;
        clearTimeout(timer);
        this.waiters = this.waiters.filter((w) => w !== check);
        resolve();
      };
      this.waiters.push(check);
    });
  }

  private notify(): void {
    for (const waiter of [...this.waiters]) waiter();
  }

  private log(message: string): void {
    if (!this.options.quiet) console.log(message);
  }
}
