/**
 * The simulated PLC as seen by its operator: one connection, one simulation
 * engine and one telegram log sharing an event channel.
 */

import { ConnectionManager, type ConnectionOptions, type ConnectionState, type Endpoint } from "./connection.js";
import { EventChannel, type AnyEventListener } from "./events.js";
import { ValidationError } from "./errors.js";
import { DeviceSimulator, type ManualTelegram, type SendResult, type SimulationState, type SimulatorOptions } from "./simulator.js";
import { TelegramLog, DEFAULT_LOG_LIMIT } from "./telegram-log.js";

export interface DeviceOptions {
  connection?: Partial<ConnectionOptions>;
  simulator?: Partial<SimulatorOptions>;
  logLimit?: number;
}

export interface DeviceSnapshot {
  state: ConnectionState;
  endpoint: Endpoint | null;
  counters: { rx: number; tx: number; messages: number };
  simulation: SimulationState;
}

export class PlcDevice {
  readonly channel = new EventChannel();
  readonly connection: ConnectionManager;
  readonly simulator: DeviceSimulator;
  readonly log: TelegramLog;
  private readonly detachLog: () => void;

  constructor(options: DeviceOptions = {}) {
    this.connection = new ConnectionManager(this.channel, options.connection);
    this.simulator = new DeviceSimulator(this.channel, this.connection, options.simulator);
    this.log = new TelegramLog(options.logLimit ?? DEFAULT_LOG_LIMIT);
    this.detachLog = this.log.attach(this.channel);
  }

  connect(host: unknown, port: unknown): Promise<boolean> {
    return this.connection.connect(host, port);
  }

  disconnect(): Promise<void> {
    return this.connection.disconnect();
  }

  /** @throws ValidationError on an empty type */
  sendManual(fields: ManualTelegram): SendResult {
    return this.simulator.sendManual(fields);
  }

  toggleAutoLife(enabled: boolean, intervalSeconds?: unknown): void {
    this.simulator.setAutoLife(enabled, intervalSeconds);
  }

  toggleAutoConfirm(enabled: boolean): void {
    this.simulator.setAutoConfirm(enabled);
  }

  /**
   * Quick actions on a received MOVE, addressed by its log index.
   * @throws ValidationError when the entry is missing or not an RX MOVE
   */
  confirmMove(idx: number): SendResult {
    return this.simulator.confirmMove(this.receivedMove(idx));
  }

  rejectMove(idx: number): SendResult {
    return this.simulator.rejectMove(this.receivedMove(idx));
  }

  subscribe(listener: AnyEventListener): () => void {
    return this.channel.subscribe(listener);
  }

  snapshot(): DeviceSnapshot {
    return {
      state: this.connection.state,
      endpoint: this.connection.endpoint,
      counters: this.log.counters,
      simulation: this.simulator.snapshot(),
    };
  }

  /** Disconnects and releases every timer and listener. */
  async close(): Promise<void> {
    await this.connection.disconnect();
    this.simulator.dispose();
    this.detachLog();
  }

  private receivedMove(idx: number) {
    const entry = this.log.get(idx);
    if (!entry?.telegram || entry.direction !== "RX" || entry.telegram.type !== "MOVE") {
      throw new ValidationError(`Log entry #${idx} is not a received MOVE telegram`);
    }
    return entry.telegram;
  }
}
