import { afterEach, describe, it, expect, vi } from "vitest";
import { EventChannel, errorEvent, statusEvent, type DeviceEvent } from "../src/events.js";

describe("EventChannel", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should deliver events in publish order on a microtask", async () => {
    const channel = new EventChannel();
    const seen: string[] = [];
    channel.subscribe((e) => seen.push(e.type === "status" ? e.status : e.type));

    channel.publish(statusEvent(1, "connecting"));
    channel.publish(statusEvent(1, "connected"));
    channel.publish(errorEvent(1, "overflow", "x"));
    expect(seen).toEqual([]);

    await Promise.resolve();
    expect(seen).toEqual(["connecting", "connected", "error"]);
  });

  it("should route typed listeners by event type", () => {
    const channel = new EventChannel();
    const onStatus = vi.fn();
    const onError = vi.fn();
    channel.on("status", onStatus);
    channel.on("error", onError);

    channel.publish(statusEvent(2, "disconnected"));
    channel.flush();

    expect(onStatus).toHaveBeenCalledTimes(1);
    expect(onStatus.mock.calls[0]?.[0]).toMatchObject({ type: "status", status: "disconnected", session: 2 });
    expect(onError).not.toHaveBeenCalled();
  });

  it("should stop delivering after unsubscribe", () => {
    const channel = new EventChannel();
    const listener = vi.fn();
    const off = channel.on("status", listener);
    off();

    channel.publish(statusEvent(1, "connected"));
    channel.flush();
    expect(listener).not.toHaveBeenCalled();
  });

  it("should fire once() listeners a single time", () => {
    const channel = new EventChannel();
    const listener = vi.fn();
    channel.once("error", listener);

    channel.publish(errorEvent(0, "validation", "a"));
    channel.publish(errorEvent(0, "validation", "b"));
    channel.flush();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0]).toMatchObject({ message: "a" });
  });

  it("should drop undelivered events on purge", () => {
    const channel = new EventChannel();
    const seen: DeviceEvent[] = [];
    channel.subscribe((e) => seen.push(e));

    channel.publish(statusEvent(1, "disconnected"));
    channel.publish(errorEvent(1, "stream", "reset"));
    expect(channel.purge()).toBe(2);
    channel.flush();

    expect(seen).toEqual([]);
    expect(channel.pending).toBe(0);
  });

  it("should deliver events published by a listener after the current one", () => {
    const channel = new EventChannel();
    const seen: string[] = [];
    channel.subscribe((e) => {
      seen.push(e.type === "status" ? e.status : e.type);
      if (e.type === "status" && e.status === "connected") {
        channel.publish(errorEvent(1, "overflow", "later"));
      }
    });

    channel.publish(statusEvent(1, "connected"));
    channel.publish(statusEvent(1, "disconnected"));
    channel.flush();

    expect(seen).toEqual(["connected", "disconnected", "error"]);
  });

  it("should keep delivering when a listener throws", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const channel = new EventChannel();
    const second = vi.fn();
    channel.subscribe(() => {
      throw new Error("boom");
    });
    channel.subscribe(second);

    channel.publish(statusEvent(1, "connected"));
    channel.flush();

    expect(second).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
