import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApi } from "./api.js";
import { loadConfig } from "./config.js";
import { PlcDevice } from "./device.js";
import type { DeviceEvent } from "./events.js";

const config = loadConfig();

const device = new PlcDevice({
  connection: { connectTimeoutMs: config.connectTimeoutMs },
  simulator: {
    deviceId: config.deviceId,
    hostId: config.hostId,
    autoLife: config.autoLife,
    lifeIntervalSeconds: config.lifeIntervalSeconds,
    autoConfirm: config.autoConfirm,
  },
  logLimit: config.logLimit,
});

function logEvent(event: DeviceEvent): void {
  switch (event.type) {
    case "status":
      if (event.status === "connected") console.log(`[✓] Connected (session ${event.session})`);
      else if (event.status === "connecting") console.log("[*] Connecting...");
      else if (event.status === "disconnected") console.log(`[-] Disconnected (session ${event.session})`);
      else console.error("[✗] Connection error");
      break;
    case "recv": {
      const t = event.telegram;
      const suffix = event.outcome === "recovered" ? ` [recovered: ${event.issues.join("; ")}]` : "";
      console.log(`[←] ${t.code} ${t.source}→${t.destination} #${t.sequence} ${t.data.trim()}${suffix}`);
      break;
    }
    case "sent": {
      const t = event.telegram;
      const hs = event.handshake ? ` (${event.handshake})` : "";
      console.log(`[→] ${t.code} ${t.source}→${t.destination} #${t.sequence} ${t.data.trim()}${hs}`);
      break;
    }
    case "error":
      console.error(`[✗] ${event.kind}: ${event.message}`);
      break;
  }
}

device.subscribe(logEvent);

serve({ fetch: createApi(device).fetch, port: config.httpPort }, () => {
  console.log(`[*] PLC simulator control API listening on port ${config.httpPort}`);
});

if (config.plcHost) {
  device.connect(config.plcHost, config.plcPort).catch((err: Error) => {
    console.error("[✗] Start-up connect failed:", err.message);
  });
}

async function shutdown(signal: string) {
  console.log(`[*] ${signal} received, disconnecting`);
  await device.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: Error) => {
      console.error("[✗] Shutdown failed:", err.message);
      process.exit(1);
    });
  });
}
