// JSON-RPC 2.0 protocol definitions for the gateway control socket
// Transport: TCP, newline-delimited frames

import { ProtocolViolation } from "./errors.js";

export const ERROR_CODES = {
  UNKNOWN_NETWORK_SEND: -32001,   // network.send on an unregistered name
  UNKNOWN_NETWORK_DELETE: -32002, // network.delete on an unregistered name
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// All supported RPC method names
export const METHODS = {
  CONTROL_DISCONNECT: "control.disconnect",
  NETWORK_ADD: "network.add",
  NETWORK_DELETE: "network.delete",
  NETWORK_GET: "network.get",
  NETWORK_SEND: "network.send",
  STREAM_START: "stream.start",
  STREAM_STOP: "stream.stop",
} as const;

export type Method = (typeof METHODS)[keyof typeof METHODS];

const METHOD_SET = new Set<string>(Object.values(METHODS));

export function isMethod(name: string): name is Method {
  return METHOD_SET.has(name);
}

/** Server-push notification method carrying one received IRC line. */
export const PUSH_METHOD = "handler";

export type RpcId = string | number | boolean | null | Record<string, unknown> | unknown[];

// JSON-RPC 2.0 request
export interface RpcRequest {
  jsonrpc: "2.0";
  id?: RpcId;
  method: string;
  params: Record<string, unknown>;
}

// JSON-RPC 2.0 response (success)
export interface RpcSuccessResponse {
  jsonrpc: "2.0";
  id: RpcId;
  result: unknown;
}

// JSON-RPC 2.0 response (error)
export interface RpcErrorResponse {
  jsonrpc: "2.0";
  id: RpcId;
  error: RpcError;
}

export type RpcResponse = RpcSuccessResponse | RpcErrorResponse;

export interface RpcError {
  code: number;
  message: string;
}

export interface PushNotification {
  jsonrpc: "2.0";
  method: typeof PUSH_METHOD;
  params: { network: string; message: string };
}

/** One decoded control line: a lone request or a batch. */
export type Incoming =
  | { kind: "single"; request: unknown }
  | { kind: "batch"; requests: unknown[] };

// Factory helpers

export function makeRequest(
  id: RpcId,
  method: string,
  params: Record<string, unknown>,
): RpcRequest {
  return { jsonrpc: "2.0", id, method, params };
}

export function makeResponse(id: RpcId, result: unknown): RpcSuccessResponse {
  return { jsonrpc: "2.0", id, result };
}

export function makeErrorResponse(id: RpcId, code: number, message: string): RpcErrorResponse {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

export function makePush(network: string, message: string): PushNotification {
  return { jsonrpc: "2.0", method: PUSH_METHOD, params: { network, message } };
}

// Type guards
export function isRpcError(resp: RpcResponse): resp is RpcErrorResponse {
  return "error" in resp;
}

export function isPush(msg: unknown): msg is PushNotification {
  if (!isPlainObject(msg) || msg.method !== PUSH_METHOD || "id" in msg) return false;
  const params = msg.params;
  return isPlainObject(params) && typeof params.network === "string" && typeof params.message === "string";
}

export function isResponse(msg: unknown): msg is RpcResponse {
  if (!isPlainObject(msg) || msg.jsonrpc !== "2.0" || !("id" in msg)) return false;
  if ("result" in msg) return true;
  const error = msg.error;
  return isPlainObject(error) && typeof error.code === "number" && typeof error.message === "string";
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Decoding

/** Parses one control line. Throws ProtocolViolation for bad JSON or a non-object/array. */
export function decodeLine(line: string): Incoming {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new ProtocolViolation("invalid JSON");
  }
  if (Array.isArray(parsed)) return { kind: "batch", requests: parsed };
  if (isPlainObject(parsed)) return { kind: "single", request: parsed };
  throw new ProtocolViolation("request must be an object or an array");
}

/** Checks the envelope shape. Throws ProtocolViolation when it is wrong. */
export function validateRequest(obj: unknown): RpcRequest {
  if (!isPlainObject(obj)) throw new ProtocolViolation("request must be an object");
  if (obj.jsonrpc !== "2.0") throw new ProtocolViolation("jsonrpc must be \"2.0\"");
  if (typeof obj.method !== "string") throw new ProtocolViolation("method is required");
  if (!isPlainObject(obj.params)) throw new ProtocolViolation("params must be an object");
  const req: RpcRequest = { jsonrpc: "2.0", method: obj.method, params: obj.params };
  if ("id" in obj) req.id = toRpcId(obj.id);
  return req;
}

function toRpcId(value: unknown): RpcId {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) return value;
  if (isPlainObject(value)) return value;
  return null;
}
