/**
 * Device-side behaviour of the simulated PLC.
 *
 * Reacts to events from the channel and pushes outbound telegrams into a
 * sink (the connection manager). Sequence numbers for every outbound
 * telegram come from the one counter held here.
 *
 * Every timer is tagged with the epoch of the session that scheduled it.
 * A timer firing after that session ended does nothing, even if a newer
 * session is up by then.
 */

import type { OutboundFrame, TelegramSink } from "./connection.js";
import type { EventChannel, Handshake, RecvEvent, StatusEvent } from "./events.js";
import { ValidationError } from "./errors.js";
import {
  SEQUENCE_MODULO,
  confirm,
  encode,
  error,
  life,
  moveView,
  type Telegram,
} from "./telegram.js";

export const DEFAULT_DEVICE_ID = "PLC-SIM";
export const DEFAULT_HOST_ID = "EWM-MFS";
export const DEFAULT_LIFE_INTERVAL_S = 10;

export interface SimulatorOptions {
  deviceId: string;
  hostId: string;
  autoLife: boolean;
  lifeIntervalSeconds: number;
  autoConfirm: boolean;
  /** Delay between receiving a LIFE and sending the PONG. */
  pongDelayMs: number;
  /** At most one PONG per window, bursts are dropped. */
  pongWindowMs: number;
  confirmDelayMs: number;
  /** Wall clock used by the PONG rate limit. */
  now: () => number;
}

const DEFAULT_OPTIONS: SimulatorOptions = {
  deviceId: DEFAULT_DEVICE_ID,
  hostId: DEFAULT_HOST_ID,
  autoLife: false,
  lifeIntervalSeconds: DEFAULT_LIFE_INTERVAL_S,
  autoConfirm: true,
  pongDelayMs: 200,
  pongWindowMs: 1000,
  confirmDelayMs: 500,
  now: () => Date.now(),
};

export interface ManualTelegram {
  /** Wire code ("MO") or type name ("MOVE"). */
  type: string;
  subtype?: string;
  source?: string;
  destination?: string;
  data?: string;
  handshake?: Handshake;
}

export interface SendResult {
  sequence: number;
  queued: boolean;
}

export interface SimulationState {
  sequence: number;
  autoLife: boolean;
  lifeIntervalSeconds: number;
  autoConfirm: boolean;
  lastPongAt: number | null;
  /** Epoch of the bound session, 0 when disconnected. */
  session: number;
  deviceId: string;
  hostId: string;
}

/** Integer seconds, at least 1; falls back to the default when not numeric. */
export function coerceInterval(seconds: unknown): number {
  const value = typeof seconds === "string" ? Number(seconds) : seconds;
  if (typeof value !== "number" || !Number.isFinite(value)) return DEFAULT_LIFE_INTERVAL_S;
  return Math.max(1, Math.trunc(value));
}

export class DeviceSimulator {
  private readonly options: SimulatorOptions;
  private sequence = 0;
  private autoLife: boolean;
  private lifeIntervalSeconds: number;
  private autoConfirm: boolean;
  private lastPongAt: number | null = null;
  private session = 0;
  private lifeTimer: NodeJS.Timeout | null = null;
  private readonly pending = new Set<NodeJS.Timeout>();
  private readonly unsubscribe: Array<() => void>;

  constructor(
    channel: EventChannel,
    private readonly sink: TelegramSink,
    options: Partial<SimulatorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.autoLife = this.options.autoLife;
    this.lifeIntervalSeconds = coerceInterval(this.options.lifeIntervalSeconds);
    this.autoConfirm = this.options.autoConfirm;

    this.unsubscribe = [
      channel.on("status", (event) => this.onStatus(event)),
      channel.on("recv", (event) => this.onRecv(event)),
    ];
  }

  get deviceId(): string {
    return this.options.deviceId;
  }

  get hostId(): string {
    return this.options.hostId;
  }

  nextSequence(): number {
    this.sequence = (this.sequence + 1) % SEQUENCE_MODULO;
    return this.sequence;
  }

  snapshot(): SimulationState {
    return {
      sequence: this.sequence,
      autoLife: this.autoLife,
      lifeIntervalSeconds: this.lifeIntervalSeconds,
      autoConfirm: this.autoConfirm,
      lastPongAt: this.lastPongAt,
      session: this.session,
      deviceId: this.options.deviceId,
      hostId: this.options.hostId,
    };
  }

  // ── Operator commands ───────────────────────────────────────────────────────

  setAutoLife(enabled: boolean, intervalSeconds: unknown = this.lifeIntervalSeconds): void {
    this.lifeIntervalSeconds = coerceInterval(intervalSeconds);
    this.autoLife = enabled;
    this.cancelLife();
    if (enabled && this.session !== 0) {
      this.lifeTick(this.session);
    }
  }

  setAutoConfirm(enabled: boolean): void {
    this.autoConfirm = enabled;
  }

  /**
   * Queues an operator-built telegram as-is, stamped with the next sequence.
   * @throws ValidationError when the type is empty
   */
  sendManual(fields: ManualTelegram): SendResult {
    if (fields.type.trim() === "") {
      throw new ValidationError("Telegram type cannot be empty");
    }
    const sequence = this.nextSequence();
    const bytes = encode({
      type: fields.type,
      subtype: fields.subtype ?? "00",
      source: fields.source ?? this.options.deviceId,
      destination: fields.destination ?? this.options.hostId,
      sequence,
      data: fields.data ?? "",
    });
    return { sequence, queued: this.push({ bytes, handshake: fields.handshake }) };
  }

  /** CONFIRM/DONE for a received MOVE, on demand. */
  confirmMove(telegram: Telegram): SendResult {
    const view = moveView(telegram);
    const sequence = this.nextSequence();
    const bytes = confirm(
      this.options.deviceId,
      this.options.hostId,
      sequence,
      view?.unit ?? "UNKNOWN",
      view?.destinationBin ?? "?",
      "DONE"
    );
    return { sequence, queued: this.push({ bytes }) };
  }

  /** ERROR E001 for a received MOVE, on demand. */
  rejectMove(telegram: Telegram): SendResult {
    const unit = moveView(telegram)?.unit ?? "?";
    const sequence = this.nextSequence();
    const bytes = error(
      this.options.deviceId,
      this.options.hostId,
      sequence,
      "E001",
      `Manual error for TU ${unit}`
    );
    return { sequence, queued: this.push({ bytes }) };
  }

  /** Cancels timers and stops listening to the channel. */
  dispose(): void {
    this.unbind();
    for (const off of this.unsubscribe) off();
  }

  // ── Event handling ──────────────────────────────────────────────────────────

  private onStatus(event: StatusEvent): void {
    if (event.status === "connected") {
      this.unbind();
      this.session = event.session;
      if (this.autoLife) this.lifeTick(event.session);
    } else if (event.status === "disconnected" || event.status === "error") {
      if (event.session === this.session) this.unbind();
    }
  }

  private onRecv(event: RecvEvent): void {
    if (event.session !== this.session) return;
    const { telegram } = event;

    if (telegram.type === "MOVE" && this.autoConfirm) {
      this.schedule(event.session, this.options.confirmDelayMs, () => {
        this.confirmMove(telegram);
      });
    }

    if (telegram.type === "LIFE") {
      const now = this.options.now();
      if (this.lastPongAt === null || now - this.lastPongAt >= this.options.pongWindowMs) {
        this.lastPongAt = now;
        this.schedule(event.session, this.options.pongDelayMs, () => {
          this.push({ bytes: life(this.options.deviceId, this.options.hostId, this.nextSequence(), true) });
        });
      }
    }
  }

  // ── Timers ──────────────────────────────────────────────────────────────────

  private lifeTick(epoch: number): void {
    if (!this.autoLife || epoch !== this.session) return;
    this.push({ bytes: life(this.options.deviceId, this.options.hostId, this.nextSequence(), false) });
    this.lifeTimer = setTimeout(() => {
      this.lifeTimer = null;
      this.lifeTick(epoch);
    }, this.lifeIntervalSeconds * 1000);
  }

  private schedule(epoch: number, delayMs: number, fn: () => void): void {
    const timer = setTimeout(() => {
      this.pending.delete(timer);
      if (epoch !== this.session) return;
      fn();
    }, delayMs);
    this.pending.add(timer);
  }

  private cancelLife(): void {
    if (this.lifeTimer) {
      clearTimeout(this.lifeTimer);
      this.lifeTimer = null;
    }
  }

  private unbind(): void {
    this.cancelLife();
    for (const timer of this.pending) clearTimeout(timer);
    this.pending.clear();
    this.session = 0;
  }

  private push(frame: OutboundFrame): boolean {
    return this.sink.send(frame);
  }
}
