import {
  NO_ERROR_TEXT,
  decodeResponse,
  encodeRequest,
  getString,
  type JsonObject,
  type RequestParams,
  type ResponseEnvelope,
} from "./codec";
import { ApiError, AuthError, ProtocolError, TransportError, describeError } from "./errors";
import { FetchHttpTransport, type HttpResponse, type HttpTransport } from "./transports";

export interface ConnInfo {
  readonly hostUrl: string;
  readonly user: string;
  readonly password: string;
}

export interface Session {
  endpoint: string;
  sessionId: string;
}

export interface TtrssClientHooks {
  onCall?: (op: string, params: RequestParams) => void;
  onResponse?: (op: string, envelope: ResponseEnvelope) => void;
  onLogin?: (user: string, session: Session) => void;
  onError?: (op: string, error: unknown) => void;
}

export interface TtrssClientOptions {
  transport?: HttpTransport;
  hooks?: TtrssClientHooks;
}

const API_PATH = "api/";
const JSON_CONTENT_TYPE = "application/json";
const REDACTED = "<redacted>";
const SECRET_PARAMS = new Set(["password", "sid"]);

export function normalizeApiEndpoint(hostUrl: string): string {
  let endpoint = hostUrl.endsWith("/") ? hostUrl : `${hostUrl}/`;
  if (!endpoint.endsWith(`/${API_PATH}`)) {
    endpoint += API_PATH;
  }
  return endpoint;
}

function redactParams(params: RequestParams): RequestParams {
  const out: RequestParams = {};
  for (const [key, value] of Object.entries(params)) {
    out[key] = SECRET_PARAMS.has(key) ? REDACTED : value;
  }
  return out;
}

export class TtrssClient {
  private current: Session | null = null;
  private readonly transport: HttpTransport;
  private readonly hooks: TtrssClientHooks;

  constructor(options: TtrssClientOptions = {}) {
    this.transport = options.transport ?? new FetchHttpTransport();
    this.hooks = options.hooks ?? {};
  }

  get session(): Session | null {
    return this.current ? { ...this.current } : null;
  }

  isAuthenticated(): boolean {
    return this.current !== null;
  }

  // A rejected login leaves the client unauthenticated.
  async login(conn: ConnInfo): Promise<Session> {
    const endpoint = normalizeApiEndpoint(conn.hostUrl);
    this.current = null;

    const envelope = await this.send(endpoint, "login", {
      user: conn.user,
      password: conn.password,
    });
    const sessionId = getString(envelope.content, "session_id");
    if (!envelope.ok || sessionId === undefined) {
      const error = new AuthError(
        `failed to log in at ${endpoint} as ${conn.user}: ${envelope.error ?? NO_ERROR_TEXT}`,
      );
      this.hooks.onError?.("login", error);
      throw error;
    }

    this.current = { endpoint, sessionId };
    this.hooks.onLogin?.(conn.user, { ...this.current });
    return { ...this.current };
  }

  // An error status comes back inside the envelope; only transport and decoding failures reject.
  async call(op: string, params: RequestParams = {}): Promise<ResponseEnvelope> {
    if (!this.current) {
      const error = new AuthError(`cannot call ${op}: not logged in`);
      this.hooks.onError?.(op, error);
      throw error;
    }
    return this.send(this.current.endpoint, op, params, this.current.sessionId);
  }

  async callOk(op: string, params: RequestParams = {}): Promise<JsonObject> {
    const envelope = await this.call(op, params);
    if (!envelope.ok) {
      const error = new ApiError(op, envelope.error ?? NO_ERROR_TEXT);
      this.hooks.onError?.(op, error);
      throw error;
    }
    return envelope.content;
  }

  async logout(): Promise<void> {
    if (!this.current) {
      return;
    }
    try {
      await this.callOk("logout");
    } finally {
      this.current = null;
    }
  }

  private async send(
    endpoint: string,
    op: string,
    params: RequestParams,
    sessionId?: string,
  ): Promise<ResponseEnvelope> {
    const body = encodeRequest(op, params, sessionId);
    this.hooks.onCall?.(op, redactParams(sessionId ? { ...params, sid: sessionId } : params));

    let response: HttpResponse;
    try {
      response = await this.transport.post({ url: endpoint, contentType: JSON_CONTENT_TYPE, body });
    } catch (cause) {
      const error = new TransportError(`connection error: ${describeError(cause)}`, { cause });
      this.hooks.onError?.(op, error);
      throw error;
    }

    let envelope: ResponseEnvelope;
    try {
      envelope = decodeResponse(response.body);
    } catch (cause) {
      const error = new ProtocolError(
        `${describeError(cause)} (HTTP ${response.status}) - are you sure ${endpoint} is the correct URL?`,
        { cause },
      );
      this.hooks.onError?.(op, error);
      throw error;
    }

    this.hooks.onResponse?.(op, envelope);
    return envelope;
  }
}
