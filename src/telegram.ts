/**
 * Warehouse telegram structure (fixed 128-byte ASCII, space-padded):
 *
 *   [0:2]     Type         LI | MO | CF | ER
 *   [2:4]     SubType      00–99
 *   [4:12]    Source       device/system name, 8 chars
 *   [12:20]   Destination  target name, 8 chars
 *   [20:26]   Sequence     zero-padded integer, wraps at 1,000,000
 *   [26:128]  Data         type-specific, 102 chars
 *
 * Data layouts:
 *   LIFE     "PING" | "PONG"
 *   MOVE     [unit 20][source bin 20][dest bin 20][priority 2][extra 40]
 *   CONFIRM  [unit 20][bin 20][status 4][timestamp 14, YYYYMMDDHHMMSS][extra 44]
 *   ERROR    [code 4][message 98]
 *
 * No delimiter and no length prefix: framing is purely positional.
 */

import { FramingError } from "./errors.js";

export const TELEGRAM_LEN = 128;
export const DATA_LEN = 102;
export const SEQUENCE_MODULO = 1_000_000;

const FIELD = {
  type: [0, 2],
  subtype: [2, 4],
  source: [4, 12],
  destination: [12, 20],
  sequence: [20, 26],
  data: [26, 128],
} as const;

export type TelegramType = "LIFE" | "MOVE" | "CONFIRM" | "ERROR" | "UNKNOWN";
export type KnownTelegramType = Exclude<TelegramType, "UNKNOWN">;

export const TYPE_CODES: Record<KnownTelegramType, string> = {
  LIFE: "LI",
  MOVE: "MO",
  CONFIRM: "CF",
  ERROR: "ER",
};

const KNOWN_TYPES: readonly KnownTelegramType[] = ["LIFE", "MOVE", "CONFIRM", "ERROR"];

const TYPES_BY_CODE = new Map<string, KnownTelegramType>(
  KNOWN_TYPES.map((type) => [TYPE_CODES[type], type] as const)
);

export function isKnownType(value: string): value is KnownTelegramType {
  return KNOWN_TYPES.some((type) => type === value);
}

export interface Telegram {
  type: TelegramType;
  /** Wire code, trimmed. Kept as-is for UNKNOWN telegrams. */
  code: string;
  subtype: string;
  source: string;
  destination: string;
  sequence: number;
  /** Full 102-char payload, padding included. */
  data: string;
  raw: string;
}

export interface TelegramFields {
  /** Wire code ("MO") or type name ("MOVE"). */
  type: string;
  subtype?: string;
  source: string;
  destination: string;
  sequence: number;
  data?: string;
}

export type DecodedTelegram =
  | { status: "parsed"; telegram: Telegram }
  | { status: "recovered"; telegram: Telegram; issues: string[] };

export interface MoveView {
  unit: string;
  sourceBin: string;
  destinationBin: string;
  priority: string;
  extra: string;
}

export interface ConfirmView {
  unit: string;
  bin: string;
  status: string;
  timestamp: string;
  extra: string;
}

export interface ErrorView {
  code: string;
  message: string;
}

// ── Encoding ─────────────────────────────────────────────────────────────────

/** Replaces every non-ASCII code point with a single "?". */
function toAscii(value: string): string {
  return value.replace(/[^\x00-\x7f]/gu, "?");
}

function fixed(value: string, width: number): string {
  return toAscii(value).slice(0, width).padEnd(width, " ");
}

export function typeCode(type: string): string {
  const upper = type.toUpperCase();
  return isKnownType(upper) ? TYPE_CODES[upper] : upper;
}

export function wrapSequence(sequence: number): number {
  const n = Number.isFinite(sequence) ? Math.trunc(sequence) : 0;
  return ((n % SEQUENCE_MODULO) + SEQUENCE_MODULO) % SEQUENCE_MODULO;
}

export function encode(fields: TelegramFields): Buffer {
  const body =
    fixed(typeCode(fields.type), 2) +
    toAscii(fields.subtype ?? "00").padStart(2, "0").slice(0, 2) +
    fixed(fields.source, 8) +
    fixed(fields.destination, 8) +
    String(wrapSequence(fields.sequence)).padStart(6, "0") +
    fixed(fields.data ?? "", DATA_LEN);

  if (body.length !== TELEGRAM_LEN) {
    throw new FramingError(
      `Telegram body length ${body.length} != ${TELEGRAM_LEN}, check field widths`
    );
  }

  return Buffer.from(body, "ascii");
}

// ── Decoding ─────────────────────────────────────────────────────────────────

/**
 * Decodes the first 128 bytes of `buf`. Returns null only when fewer than
 * 128 bytes are available; anything else yields a telegram, tagged
 * "recovered" when some field had to be repaired.
 */
export function decode(buf: Uint8Array): DecodedTelegram | null {
  if (buf.length < TELEGRAM_LEN) return null;

  const issues: string[] = [];
  let raw = "";
  let nonAscii = 0;
  for (let i = 0; i < TELEGRAM_LEN; i++) {
    const byte = buf[i] ?? 0;
    if (byte > 0x7f) {
      nonAscii++;
      raw += "?";
    } else {
      raw += String.fromCharCode(byte);
    }
  }
  if (nonAscii > 0) issues.push(`${nonAscii} non-ASCII byte(s) replaced`);

  const field = (name: keyof typeof FIELD) => raw.slice(FIELD[name][0], FIELD[name][1]);

  const code = field("type").trim();
  const type = TYPES_BY_CODE.get(code) ?? "UNKNOWN";
  if (type === "UNKNOWN") issues.push(`unknown type code "${code}"`);

  const sequenceText = field("sequence").trim();
  let sequence = 0;
  if (/^\d+$/.test(sequenceText)) {
    sequence = Number(sequenceText);
  } else {
    issues.push(`non-numeric sequence "${sequenceText}"`);
  }

  const telegram: Telegram = {
    type,
    code,
    subtype: field("subtype").trim(),
    source: field("source").trim(),
    destination: field("destination").trim(),
    sequence,
    data: field("data"),
    raw,
  };

  return issues.length === 0
    ? { status: "parsed", telegram }
    : { status: "recovered", telegram, issues };
}

// ── Sub-payload views ────────────────────────────────────────────────────────

export function moveView(t: Telegram): MoveView | null {
  if (t.type !== "MOVE") return null;
  return {
    unit: t.data.slice(0, 20).trim(),
    sourceBin: t.data.slice(20, 40).trim(),
    destinationBin: t.data.slice(40, 60).trim(),
    priority: t.data.slice(60, 62).trim(),
    extra: t.data.slice(62, 102).trim(),
  };
}

export function confirmView(t: Telegram): ConfirmView | null {
  if (t.type !== "CONFIRM") return null;
  return {
    unit: t.data.slice(0, 20).trim(),
    bin: t.data.slice(20, 40).trim(),
    status: t.data.slice(40, 44).trim(),
    timestamp: t.data.slice(44, 58).trim(),
    extra: t.data.slice(58, 102).trim(),
  };
}

export function errorView(t: Telegram): ErrorView | null {
  if (t.type !== "ERROR") return null;
  return {
    code: t.data.slice(0, 4).trim(),
    message: t.data.slice(4, 102).trim(),
  };
}

// ── Builders ─────────────────────────────────────────────────────────────────

/** Local wall-clock time as YYYYMMDDHHMMSS. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    String(date.getFullYear()).padStart(4, "0") +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

export function life(source: string, destination: string, sequence: number, isPong = false): Buffer {
  return encode({
    type: "LI",
    subtype: "00",
    source,
    destination,
    sequence,
    data: isPong ? "PONG" : "PING",
  });
}

export function move(
  source: string,
  destination: string,
  sequence: number,
  unit: string,
  fromBin: string,
  toBin: string,
  priority = "00"
): Buffer {
  const data = fixed(unit, 20) + fixed(fromBin, 20) + fixed(toBin, 20) + fixed(priority, 2);
  return encode({ type: "MO", subtype: "00", source, destination, sequence, data });
}

export function confirm(
  source: string,
  destination: string,
  sequence: number,
  unit: string,
  bin: string,
  status = "DONE",
  now: Date = new Date()
): Buffer {
  const data = fixed(unit, 20) + fixed(bin, 20) + fixed(status, 4) + fixed(formatTimestamp(now), 14);
  return encode({ type: "CF", subtype: "00", source, destination, sequence, data });
}

export function error(
  source: string,
  destination: string,
  sequence: number,
  code: string,
  message: string
): Buffer {
  const data = fixed(code, 4) + fixed(message, 98);
  return encode({ type: "ER", subtype: "00", source, destination, sequence, data });
}
