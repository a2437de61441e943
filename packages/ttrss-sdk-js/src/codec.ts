import { ProtocolError, describeError } from "./errors";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type RequestParams = Record<string, JsonValue>;

export const API_STATUS_OK = 0;
export const API_STATUS_ERR = 1;

export const NO_ERROR_TEXT = "(response contained no error text)";

export interface ResponseEnvelope {
  // Echo of the request "seq"; servers send 0 or null when none was given.
  seq: number | null;
  status: number;
  ok: boolean;
  error?: string;
  content: JsonObject;
}

// Values produced by JSON.parse only ever hold JSON types, so an object check suffices.
export function isJsonObject(value: unknown): value is JsonObject {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function getString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

export function getNumber(obj: JsonObject, key: string): number | undefined {
  const value = obj[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function getObject(obj: JsonObject, key: string): JsonObject | undefined {
  const value = obj[key];
  return isJsonObject(value) ? value : undefined;
}

export function getArray(obj: JsonObject, key: string): JsonValue[] | undefined {
  const value = obj[key];
  return Array.isArray(value) ? value : undefined;
}

export function encodeRequest(op: string, params: RequestParams, sessionId?: string): string {
  const body: RequestParams = { ...params, op };
  if (sessionId) {
    body.sid = sessionId;
  }
  return JSON.stringify(body);
}

function decodeSeq(value: unknown): number | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "number") {
    throw new ProtocolError(`API response has a non-numeric seq: ${JSON.stringify(value)}`);
  }
  return value;
}

function decodeContent(value: unknown): JsonObject {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isJsonObject(value)) {
    throw new ProtocolError("API response content is not an object");
  }
  return value;
}

export function decodeResponse(text: string): ResponseEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(`API JSON response was malformed: ${describeError(error)}`, {
      cause: error,
    });
  }
  if (!isJsonObject(parsed)) {
    throw new ProtocolError("API response is not a JSON object");
  }

  const status = parsed.status;
  if (typeof status !== "number" || !Number.isInteger(status)) {
    throw new ProtocolError(`API response has no numeric status: ${JSON.stringify(status ?? null)}`);
  }

  const content = decodeContent(parsed.content);
  const ok = status === API_STATUS_OK;
  let error = getString(content, "error");
  if (!ok && error === undefined) {
    error = NO_ERROR_TEXT;
  }

  const envelope: ResponseEnvelope = {
    seq: decodeSeq(parsed.seq),
    status,
    ok,
    content,
  };
  if (error !== undefined) {
    envelope.error = error;
  }
  return envelope;
}
