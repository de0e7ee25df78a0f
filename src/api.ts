import { Hono, type Context } from "hono";
import type { PlcDevice } from "./device.js";
import { ValidationError } from "./errors.js";
import type { ErrorKind, Handshake } from "./events.js";
import type { LogEntry } from "./telegram-log.js";

type Body = Record<string, unknown>;

async function readBody(c: Context): Promise<Body | null> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return null;
  }
  return isRecord(body) ? body : null;
}

function isRecord(value: unknown): value is Body {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  return typeof value === "string" ? value : undefined;
}

function isHandshake(value: unknown): value is Handshake {
  return value === "" || value === "REQ" || value === "ACK";
}

function serializeEntry(entry: LogEntry) {
  return {
    idx: entry.idx,
    direction: entry.direction,
    time: entry.time.toISOString(),
    session: entry.session,
    handshake: entry.handshake,
    text: entry.text,
    telegram: entry.telegram ?? null,
  };
}

/**
 * HTTP control surface for the simulated device.
 */
export function createApi(device: PlcDevice): Hono {
  const app = new Hono();

  // ── Health ──────────────────────────────────────────────────────────────────

  app.get("/health", (c) => c.json({ status: "ok" }));

  /**
   * GET /status
   * Connection state, counters and simulation toggles.
   */
  app.get("/status", (c) => c.json(device.snapshot()));

  // ── Connection ──────────────────────────────────────────────────────────────

  /**
   * POST /connect
   * Body: { host, port }. Replaces any live session.
   */
  app.post("/connect", async (c) => {
    const body = await readBody(c);
    if (!body) return c.json({ error: "Invalid JSON body" }, 400);

    // failures arrive as channel events; the first validation or connect error decides the reply
    const failure: { kind: ErrorKind | null; message: string } = {
      kind: null,
      message: "Connection attempt was superseded",
    };
    const off = device.channel.on("error", (event) => {
      if (failure.kind === null && (event.kind === "validation" || event.kind === "connect")) {
        failure.kind = event.kind;
        failure.message = event.message;
      }
    });
    try {
      const ok = await device.connect(body.host, body.port);
      device.channel.flush();
      if (ok) return c.json(device.snapshot());
      if (failure.kind === "validation") return c.json({ error: failure.message }, 400);
      if (failure.kind === "connect") return c.json({ error: failure.message }, 502);
      return c.json({ error: failure.message }, 409);
    } finally {
      off();
    }
  });

  /**
   * POST /disconnect
   * Idempotent.
   */
  app.post("/disconnect", async (c) => {
    await device.disconnect();
    return c.json(device.snapshot());
  });

  // ── Telegrams ───────────────────────────────────────────────────────────────

  /**
   * POST /telegrams
   * Body: { type, subtype?, source?, destination?, data?, handshake? }
   * Sent as-is, stamped with the next sequence number.
   */
  app.post("/telegrams", async (c) => {
    const body = await readBody(c);
    if (!body) return c.json({ error: "Invalid JSON body" }, 400);

    const type = optionalString(body, "type");
    if (type === undefined) return c.json({ error: "type is required" }, 400);
    const handshake = body.handshake ?? "";
    if (!isHandshake(handshake)) return c.json({ error: "handshake must be REQ, ACK or empty" }, 400);

    if (!device.connection.isConnected()) return c.json({ error: "Not connected" }, 409);

    try {
      const result = device.sendManual({
        type,
        subtype: optionalString(body, "subtype"),
        source: optionalString(body, "source"),
        destination: optionalString(body, "destination"),
        data: optionalString(body, "data"),
        handshake,
      });
      return c.json(result, result.queued ? 202 : 409);
    } catch (err) {
      if (err instanceof ValidationError) return c.json({ error: err.message }, 400);
      throw err;
    }
  });

  // ── Simulation toggles ──────────────────────────────────────────────────────

  /**
   * PUT /auto-life
   * Body: { enabled, interval? }, interval in seconds, minimum 1.
   */
  app.put("/auto-life", async (c) => {
    const body = await readBody(c);
    if (!body || typeof body.enabled !== "boolean") {
      return c.json({ error: "enabled must be a boolean" }, 400);
    }
    device.toggleAutoLife(body.enabled, body.interval);
    return c.json(device.simulator.snapshot());
  });

  /**
   * PUT /auto-confirm
   * Body: { enabled }
   */
  app.put("/auto-confirm", async (c) => {
    const body = await readBody(c);
    if (!body || typeof body.enabled !== "boolean") {
      return c.json({ error: "enabled must be a boolean" }, 400);
    }
    device.toggleAutoConfirm(body.enabled);
    return c.json(device.simulator.snapshot());
  });

  // ── Log ─────────────────────────────────────────────────────────────────────

  /**
   * GET /log
   * Newest entries, oldest first.
   *
   * Query params:
   *   limit  – max entries to return (default 100, max 1000)
   */
  app.get("/log", (c) => {
    const requested = Number(c.req.query("limit") ?? 100);
    const limit = Number.isFinite(requested) ? Math.min(Math.max(Math.trunc(requested), 0), 1000) : 100;
    return c.json({
      counters: device.log.counters,
      entries: device.log.tail(limit).map(serializeEntry),
    });
  });

  app.get("/log/export", (c) => {
    c.header("Content-Type", "text/tab-separated-values; charset=utf-8");
    c.header("Content-Disposition", `attachment; filename="plcsim-export-${Math.floor(Date.now() / 1000)}.txt"`);
    return c.body(device.log.toTsv());
  });

  app.delete("/log", (c) => {
    device.log.clear();
    return c.json(device.log.counters);
  });

  /**
   * POST /log/:idx/confirm, POST /log/:idx/error
   * Quick replies to a received MOVE.
   */
  app.post("/log/:idx/:action{confirm|error}", (c) => {
    const idx = Number(c.req.param("idx"));
    const action = c.req.param("action");
    if (!Number.isInteger(idx)) return c.json({ error: "idx must be an integer" }, 400);
    if (!device.connection.isConnected()) return c.json({ error: "Not connected" }, 409);

    try {
      const result = action === "confirm" ? device.confirmMove(idx) : device.rejectMove(idx);
      return c.json(result, result.queued ? 202 : 409);
    } catch (err) {
      if (err instanceof ValidationError) return c.json({ error: err.message }, 404);
      throw err;
    }
  });

  return app;
}
