import type { DeviceEvent, EventChannel, Handshake } from "./events.js";
import type { Telegram } from "./telegram.js";

export const DEFAULT_LOG_LIMIT = 5000;
const PAYLOAD_PREVIEW = 60;

export type Direction = "RX" | "TX" | "SYS";

export interface LogEntry {
  idx: number;
  direction: Direction;
  time: Date;
  session: number;
  /** Absent for SYS notices. */
  telegram?: Telegram;
  handshake: Handshake;
  /** Trimmed payload preview, or the notice text. */
  text: string;
}

/** Tab, CR, LF and other control characters would break the export's columns. */
export function sanitizeField(value: string): string {
  return value.replace(/[\x00-\x1f\x7f]/g, " ");
}

/** HH:MM:SS.mmm, local time. */
export function formatTime(date: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * Bounded in-memory record of observed telegrams and system notices.
 * At capacity the oldest entry is dropped.
 */
export class TelegramLog {
  private entries: LogEntry[] = [];
  private nextIdx = 1;
  private rx = 0;
  private tx = 0;

  constructor(readonly limit: number = DEFAULT_LOG_LIMIT) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
  }

  /** Records channel events until the returned function is called. */
  attach(channel: EventChannel): () => void {
    return channel.subscribe((event) => this.record(event));
  }

  record(event: DeviceEvent): void {
    switch (event.type) {
      case "recv":
        this.rx++;
        this.append("RX", event.session, event.at, event.telegram, "");
        break;
      case "sent":
        this.tx++;
        this.append("TX", event.session, event.at, event.telegram, event.handshake);
        break;
      case "status":
        if (event.status === "connected" || event.status === "disconnected") {
          this.notice(event.status === "connected" ? "Connected" : "Disconnected", event.session, event.at);
        }
        break;
      case "error":
        this.notice(`ERROR: ${event.message}`, event.session, event.at);
        break;
    }
  }

  notice(text: string, session = 0, time: Date = new Date()): LogEntry {
    return this.push({ direction: "SYS", time, session, handshake: "", text });
  }

  get size(): number {
    return this.entries.length;
  }

  get counters(): { rx: number; tx: number; messages: number } {
    return { rx: this.rx, tx: this.tx, messages: this.entries.length };
  }

  get(idx: number): LogEntry | undefined {
    return this.entries.find((entry) => entry.idx === idx);
  }

  /** Newest `limit` entries, oldest first. */
  tail(limit = this.entries.length): LogEntry[] {
    return limit <= 0 ? [] : this.entries.slice(-limit);
  }

  clear(): void {
    this.entries = [];
    this.nextIdx = 1;
    this.rx = 0;
    this.tx = 0;
  }

  /** Tab-separated dump; every field is stripped of control characters. */
  toTsv(): string {
    const lines = ["TIME\tDIR\tSRC\tDST\tTYPE\tSEQ\tHS\tDATA"];
    for (const entry of this.entries) {
      const t = entry.telegram;
      const fields = [
        formatTime(entry.time),
        entry.direction,
        t ? t.source : "SYSTEM",
        t ? t.destination : "",
        t ? t.code : "SYS",
        t ? String(t.sequence).padStart(6, "0") : "-",
        entry.handshake,
        t ? t.data.trim() : entry.text,
      ];
      lines.push(fields.map(sanitizeField).join("\t"));
    }
    return lines.join("\n") + "\n";
  }

  private append(direction: Direction, session: number, time: Date, telegram: Telegram, handshake: Handshake): void {
    this.push({
      direction,
      time,
      session,
      telegram,
      handshake,
      text: telegram.data.trim().slice(0, PAYLOAD_PREVIEW),
    });
  }

  private push(fields: Omit<LogEntry, "idx">): LogEntry {
    const entry: LogEntry = { idx: this.nextIdx++, ...fields };
    if (this.entries.length >= this.limit) {
      this.entries.splice(0, this.entries.length - this.limit + 1);
    }
    this.entries.push(entry);
    return entry;
  }
}
