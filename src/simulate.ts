/**
 * Plays the warehouse host against a running simulator.
 *
 * Flow:
 *   1. Listen on SIM_HOST:SIM_PORT and wait for the device to connect
 *   2. Send a LIFE/PING, expect a PONG
 *   3. Send a MOVE order every few seconds, expect a CONFIRM for each
 *
 * Usage:
 *   npm run simulate
 *   curl -X POST localhost:3000/connect -H 'content-type: application/json' \
 *        -d '{"host":"127.0.0.1","port":5000}'
 */

import "dotenv/config";
import { loadConfig } from "./config.js";
import { MockHost } from "./mock-host.js";
import { confirmView, life, move } from "./telegram.js";

const MOVE_EVERY_MS = 5000;

async function run() {
  const config = loadConfig();
  // the host's own telegrams travel in the opposite direction
  const from = config.hostId;
  const to = config.deviceId;
  let sequence = 0;
  let unit = 0;

  const host = new MockHost({
    host: config.simHost,
    port: config.simPort,
    onTelegram: (t) => {
      const cf = confirmView(t);
      if (cf) console.log(`[✓] CONFIRM for ${cf.unit} at ${cf.bin}: ${cf.status} (${cf.timestamp})`);
    },
  });
  await host.listen();

  for (;;) {
    await waitForDevice(host);

    console.log("[→] Sending LIFE/PING");
    await host.write(life(from, to, ++sequence)).catch((err: Error) => {
      console.warn(`[!] PING not delivered: ${err.message}`);
    });

    while (host.connected) {
      unit++;
      const tu = `TU${String(unit).padStart(4, "0")}`;
      console.log(`[→] Sending MOVE ${tu} BIN-01 → BIN-99`);
      await host.write(move(from, to, ++sequence, tu, "BIN-01", "BIN-99", "05")).catch((err: Error) => {
        console.warn(`[!] MOVE not delivered: ${err.message}`);
      });
      await new Promise((resolve) => setTimeout(resolve, MOVE_EVERY_MS));
    }
  }
}

async function waitForDevice(host: MockHost): Promise<void> {
  for (;;) {
    try {
      await host.waitForClient(60_000);
      return;
    } catch {
      console.log("[*] Still waiting for the device to connect...");
    }
  }
}

run().catch((err: Error) => {
  console.error("[✗] Fatal:", err.message);
  process.exit(1);
});
