export type PlcSimErrorCode = "VALIDATION" | "CONNECT" | "STREAM" | "FRAMING";

export class PlcSimError extends Error {
  constructor(
    message: string,
    public readonly code: PlcSimErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PlcSimError";
  }
}

/** Bad host/port or manual telegram fields. Rejected before any socket is touched. */
export class ValidationError extends PlcSimError {
  constructor(message: string) {
    super(message, "VALIDATION");
    this.name = "ValidationError";
  }
}

/** TCP connect failure or timeout. The connection returns to idle. */
export class ConnectError extends PlcSimError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONNECT", options);
    this.name = "ConnectError";
  }
}

/** Read/write failure in the middle of a session. */
export class StreamError extends PlcSimError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "STREAM", options);
    this.name = "StreamError";
  }
}

/** Codec invariant violation. A defect, never a runtime condition. */
export class FramingError extends PlcSimError {
  constructor(message: string) {
    super(message, "FRAMING");
    this.name = "FramingError";
  }
}
