// errors.ts — error types shared by the control and network paths

/**
 * A control request that breaks the envelope, authentication or parameter
 * contract. The session closes without sending a response.
 */
export class ProtocolViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolViolation";
  }
}

/** Recoverable method failure, answered with a JSON-RPC error object. */
export class RpcMethodError extends Error {
  constructor(readonly rpcCode: number, message: string) {
    super(message);
    this.name = "RpcMethodError";
  }
}

/** Inbound IRC bytes that decode under neither UTF-8 nor Latin-1. */
export class DecodeError extends Error {
  constructor(readonly network: string, readonly raw: Uint8Array, options?: { cause?: unknown }) {
    super(`[${network}] could not decode ${raw.length}-byte line`, options);
    this.name = "DecodeError";
  }
}

/** Config file that is unreadable as JSON or does not match the schema. */
export class ConfigError extends Error {
  constructor(readonly path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "ConfigError";
  }
}
