import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { OutboundFrame, TelegramSink } from "../src/connection.js";
import { ValidationError } from "../src/errors.js";
import { EventChannel, statusEvent, type DeviceEvent, type RecvEvent } from "../src/events.js";
import { DeviceSimulator, coerceInterval, type SimulatorOptions } from "../src/simulator.js";
import { confirmView, decode, errorView, life, move, type Telegram } from "../src/telegram.js";

class RecordingSink implements TelegramSink {
  readonly frames: OutboundFrame[] = [];
  connected = true;

  send(frame: OutboundFrame): boolean {
    if (!this.connected) return false;
    this.frames.push(frame);
    return true;
  }

  get telegrams(): Telegram[] {
    return this.frames.flatMap((f) => {
      const decoded = decode(f.bytes);
      return decoded ? [decoded.telegram] : [];
    });
  }
}

function recv(session: number, bytes: Buffer): RecvEvent {
  const decoded = decode(bytes);
  if (!decoded) throw new Error("short frame");
  return { type: "recv", telegram: decoded.telegram, outcome: "parsed", issues: [], bytes, session, at: new Date() };
}

const ping = (seq: number) => life("EWM-MFS", "PLC-SIM", seq);
const order = (seq: number, unit = "TU0001") => move("EWM-MFS", "PLC-SIM", seq, unit, "BIN-01", "BIN-99", "05");

describe("DeviceSimulator", () => {
  let channel: EventChannel;
  let sink: RecordingSink;
  let sim: DeviceSimulator;

  function start(options: Partial<SimulatorOptions> = {}, session = 1) {
    sim = new DeviceSimulator(channel, sink, options);
    deliver(statusEvent(session, "connected"));
  }

  function deliver(...events: DeviceEvent[]) {
    for (const event of events) channel.publish(event);
    channel.flush();
  }

  beforeEach(() => {
    vi.useFakeTimers();
    channel = new EventChannel();
    sink = new RecordingSink();
  });

  afterEach(() => {
    sim.dispose();
    vi.useRealTimers();
  });

  describe("auto-pong", () => {
    it("should answer a LIFE with a PONG after 200 ms", () => {
      start();
      deliver(recv(1, ping(1)));

      vi.advanceTimersByTime(199);
      expect(sink.frames).toHaveLength(0);
      vi.advanceTimersByTime(1);

      expect(sink.telegrams).toMatchObject([
        { type: "LIFE", source: "PLC-SIM", destination: "EWM-MFS", sequence: 1 },
      ]);
      expect(sink.telegrams[0]?.data.trim()).toBe("PONG");
    });

    it("should send one PONG for a burst of five LIFE within 200 ms", () => {
      start();
      for (let i = 1; i <= 5; i++) {
        deliver(recv(1, ping(i)));
        vi.advanceTimersByTime(50);
      }
      vi.advanceTimersByTime(1000);

      expect(sink.frames).toHaveLength(1);
    });

    it("should PONG again once the window has passed", () => {
      start();
      deliver(recv(1, ping(1)));
      vi.advanceTimersByTime(999);
      deliver(recv(1, ping(2)));
      vi.advanceTimersByTime(1);
      deliver(recv(1, ping(3)));
      vi.advanceTimersByTime(500);

      expect(sink.telegrams.map((t) => t.sequence)).toEqual([1, 2]);
    });
  });

  describe("auto-confirm", () => {
    it("should confirm a MOVE with its unit and destination bin", () => {
      start();
      deliver(recv(1, order(3, "TU0042")));

      vi.advanceTimersByTime(499);
      expect(sink.frames).toHaveLength(0);
      vi.advanceTimersByTime(1);

      const [t] = sink.telegrams;
      expect(t).toMatchObject({ type: "CONFIRM", source: "PLC-SIM", destination: "EWM-MFS", sequence: 1 });
      expect(t && confirmView(t)).toMatchObject({ unit: "TU0042", bin: "BIN-99", status: "DONE" });
    });

    it("should not confirm when disabled", () => {
      start({ autoConfirm: false });
      deliver(recv(1, order(3)));
      vi.advanceTimersByTime(5000);
      expect(sink.frames).toHaveLength(0);

      sim.setAutoConfirm(true);
      deliver(recv(1, order(4)));
      vi.advanceTimersByTime(500);
      expect(sink.frames).toHaveLength(1);
    });

    it("should ignore telegrams of another session", () => {
      start();
      deliver(recv(2, order(3)), recv(2, ping(4)));
      vi.advanceTimersByTime(5000);
      expect(sink.frames).toHaveLength(0);
    });
  });

  describe("auto-life", () => {
    it("should send a PING at connect and then every interval", () => {
      start({ autoLife: true, lifeIntervalSeconds: 2 });
      expect(sink.frames).toHaveLength(1);
      expect(sink.telegrams[0]?.data.trim()).toBe("PING");

      vi.advanceTimersByTime(1999);
      expect(sink.frames).toHaveLength(1);
      vi.advanceTimersByTime(1);
      expect(sink.frames).toHaveLength(2);
      vi.advanceTimersByTime(4000);
      expect(sink.telegrams.map((t) => t.sequence)).toEqual([1, 2, 3, 4]);
    });

    it("should clamp the interval to at least one second", () => {
      start();
      sim.setAutoLife(true, 0.4);
      expect(sim.snapshot()).toMatchObject({ autoLife: true, lifeIntervalSeconds: 1 });
      expect(sink.frames).toHaveLength(1);

      vi.advanceTimersByTime(3000);
      expect(sink.frames).toHaveLength(4);
    });

    it("should stop when disabled", () => {
      start({ autoLife: true, lifeIntervalSeconds: 1 });
      vi.advanceTimersByTime(1000);
      expect(sink.frames).toHaveLength(2);

      sim.setAutoLife(false);
      vi.advanceTimersByTime(10_000);
      expect(sink.frames).toHaveLength(2);
    });

    it("should not tick while disconnected", () => {
      sim = new DeviceSimulator(channel, sink);
      sim.setAutoLife(true, 1);
      vi.advanceTimersByTime(5000);
      expect(sink.frames).toHaveLength(0);

      deliver(statusEvent(1, "connected"));
      expect(sink.frames).toHaveLength(1);
    });
  });

  describe("session changes", () => {
    it("should cancel every timer on disconnect", () => {
      start({ autoLife: true, lifeIntervalSeconds: 1 });
      deliver(recv(1, order(2)), recv(1, ping(3)));
      expect(sink.frames).toHaveLength(1);

      deliver(statusEvent(1, "disconnected"));
      vi.advanceTimersByTime(10_000);

      expect(sink.frames).toHaveLength(1);
      expect(sim.snapshot().session).toBe(0);
    });

    it("should drop replies scheduled by a previous session", () => {
      start();
      deliver(recv(1, order(2)));
      vi.advanceTimersByTime(100);
      deliver(statusEvent(2, "connected"));
      vi.advanceTimersByTime(5000);

      expect(sink.frames).toHaveLength(0);
      expect(sim.snapshot().session).toBe(2);
    });

    it("should ignore a disconnect of a session it is not bound to", () => {
      start({}, 2);
      deliver(recv(2, order(2)), statusEvent(1, "disconnected"));
      vi.advanceTimersByTime(500);
      expect(sink.frames).toHaveLength(1);
    });
  });

  describe("manual telegrams", () => {
    it("should stamp the next shared sequence and default the addresses", () => {
      start({ deviceId: "PLC-07", hostId: "HOST-1" });
      deliver(recv(1, ping(1)));
      vi.advanceTimersByTime(200);

      const result = sim.sendManual({ type: "ER", data: "E042 JAM", handshake: "REQ" });

      expect(result).toEqual({ sequence: 2, queued: true });
      expect(sink.frames[1]?.handshake).toBe("REQ");
      expect(sink.telegrams[1]).toMatchObject({
        type: "ERROR",
        subtype: "00",
        source: "PLC-07",
        destination: "HOST-1",
        sequence: 2,
      });
      expect(sim.nextSequence()).toBe(3);
    });

    it("should reject an empty type", () => {
      start();
      expect(() => sim.sendManual({ type: " " })).toThrow(ValidationError);
      expect(sim.snapshot().sequence).toBe(0);
    });

    it("should consume a sequence even when not queued", () => {
      start();
      sink.connected = false;
      expect(sim.sendManual({ type: "LIFE", data: "PING" })).toEqual({ sequence: 1, queued: false });
      sink.connected = true;
      expect(sim.sendManual({ type: "LIFE", data: "PING" })).toEqual({ sequence: 2, queued: true });
    });

    it("should confirm or reject a given MOVE on demand", () => {
      start({ autoConfirm: false });
      const received = recv(1, order(9, "TU0007")).telegram;

      sim.confirmMove(received);
      sim.rejectMove(received);

      const [cf, er] = sink.telegrams;
      expect(cf && confirmView(cf)).toMatchObject({ unit: "TU0007", bin: "BIN-99", status: "DONE" });
      expect(er && errorView(er)).toEqual({ code: "E001", message: "Manual error for TU TU0007" });
      expect(er?.sequence).toBe(2);
    });
  });
});

describe("coerceInterval()", () => {
  it("should truncate and clamp to at least one second", () => {
    expect(coerceInterval(2.9)).toBe(2);
    expect(coerceInterval(0)).toBe(1);
    expect(coerceInterval(-5)).toBe(1);
    expect(coerceInterval("15")).toBe(15);
  });

  it("should fall back to ten seconds for non-numeric input", () => {
    expect(coerceInterval("abc")).toBe(10);
    expect(coerceInterval(undefined)).toBe(10);
  });
});
