import { describe, expect, test } from "vitest";

import { TtrssClient, normalizeApiEndpoint } from "../src/client";
import { NO_ERROR_TEXT, type RequestParams } from "../src/codec";
import { ApiError, AuthError, ProtocolError, TransportError } from "../src/errors";
import { InMemoryHttpTransport } from "../src/transports";
import {
  TEST_ENDPOINT,
  TEST_HOST,
  TEST_PASSWORD,
  TEST_SESSION_ID,
  TEST_USER,
  envelope,
  fakeServer,
  requestBody,
} from "./fixtures";

const conn = { hostUrl: TEST_HOST, user: TEST_USER, password: TEST_PASSWORD };

describe("normalizeApiEndpoint", () => {
  test("appends the separator and api path once", () => {
    expect(normalizeApiEndpoint("https://rss.example/tt-rss")).toBe(TEST_ENDPOINT);
    expect(normalizeApiEndpoint("https://rss.example/tt-rss/")).toBe(TEST_ENDPOINT);
    expect(normalizeApiEndpoint("https://rss.example/tt-rss/api")).toBe(TEST_ENDPOINT);
    expect(normalizeApiEndpoint(TEST_ENDPOINT)).toBe(TEST_ENDPOINT);
  });
});

describe("TtrssClient login", () => {
  test("stores the session returned by the server", async () => {
    const transport = fakeServer();
    const client = new TtrssClient({ transport });

    const session = await client.login(conn);

    expect(session).toEqual({ endpoint: TEST_ENDPOINT, sessionId: TEST_SESSION_ID });
    expect(client.isAuthenticated()).toBe(true);
    expect(transport.requests).toHaveLength(1);
    expect(transport.requests[0].url).toBe(TEST_ENDPOINT);
    expect(transport.requests[0].contentType).toBe("application/json");
    expect(requestBody(transport.requests[0].body)).toEqual({
      user: TEST_USER,
      password: TEST_PASSWORD,
      op: "login",
    });
  });

  test("rejected credentials raise AuthError with the server text", async () => {
    const client = new TtrssClient({ transport: fakeServer() });
    await expect(client.login({ ...conn, password: "wrong" })).rejects.toThrow(
      new AuthError(`failed to log in at ${TEST_ENDPOINT} as admin: LOGIN_ERROR`),
    );
    expect(client.session).toBeNull();
  });

  test("a missing session id is a failed login", async () => {
    const transport = new InMemoryHttpTransport(() => envelope({ api_level: 18 }));
    const client = new TtrssClient({ transport });
    const failure = client.login(conn);
    await expect(failure).rejects.toBeInstanceOf(AuthError);
    await expect(failure).rejects.toThrow(`as admin: ${NO_ERROR_TEXT}`);
  });

  test("a failed login drops the previous session", async () => {
    const client = new TtrssClient({ transport: fakeServer() });
    await client.login(conn);
    await expect(client.login({ ...conn, user: "nobody" })).rejects.toBeInstanceOf(AuthError);
    expect(client.isAuthenticated()).toBe(false);
  });
});

describe("TtrssClient call", () => {
  test("requires a session", async () => {
    const client = new TtrssClient({ transport: fakeServer() });
    await expect(client.call("getFeedTree")).rejects.toBeInstanceOf(AuthError);
  });

  test("injects op and sid", async () => {
    const transport = fakeServer();
    const client = new TtrssClient({ transport });
    await client.login(conn);

    const response = await client.call("logout", {});

    expect(response.ok).toBe(true);
    expect(requestBody(transport.requests[1].body)).toEqual({ op: "logout", sid: TEST_SESSION_ID });
  });

  test("returns error statuses inside the envelope", async () => {
    const client = new TtrssClient({ transport: fakeServer() });
    await client.login(conn);

    const response = await client.call("noSuchMethod");

    expect(response.ok).toBe(false);
    expect(response.status).toBe(1);
    expect(response.error).toBe("UNKNOWN_METHOD");
  });

  test("callOk turns an error status into ApiError", async () => {
    const client = new TtrssClient({ transport: fakeServer() });
    await client.login(conn);

    const failure = client.callOk("noSuchMethod");
    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({ op: "noSuchMethod", apiMessage: "UNKNOWN_METHOD" });
  });

  test("network failures surface as TransportError", async () => {
    const transport = new InMemoryHttpTransport(() => {
      throw new Error("ECONNREFUSED");
    });
    const client = new TtrssClient({ transport });
    const failure = client.login(conn);
    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrow("connection error: ECONNREFUSED");
  });

  test("undecodable bodies surface as ProtocolError", async () => {
    const transport = new InMemoryHttpTransport(() => ({ status: 404, body: "<html></html>" }));
    const client = new TtrssClient({ transport });
    const failure = client.login(conn);
    await expect(failure).rejects.toBeInstanceOf(ProtocolError);
    await expect(failure).rejects.toThrow(
      `(HTTP 404) - are you sure ${TEST_ENDPOINT} is the correct URL?`,
    );
  });

  test("logout forgets the session", async () => {
    const client = new TtrssClient({ transport: fakeServer() });
    await client.login(conn);
    await client.logout();
    expect(client.session).toBeNull();
  });
});

describe("TtrssClient hooks", () => {
  test("reports calls with secrets redacted", async () => {
    const calls: Array<{ op: string; params: RequestParams }> = [];
    const logins: string[] = [];
    const client = new TtrssClient({
      transport: fakeServer(),
      hooks: {
        onCall: (op, params) => calls.push({ op, params }),
        onLogin: (user, session) => logins.push(`${user}@${session.endpoint}`),
      },
    });

    await client.login(conn);
    await client.call("logout");

    expect(calls).toEqual([
      { op: "login", params: { user: TEST_USER, password: "<redacted>" } },
      { op: "logout", params: { sid: "<redacted>" } },
    ]);
    expect(logins).toEqual([`admin@${TEST_ENDPOINT}`]);
  });

  test("reports failures through onError", async () => {
    const errors: string[] = [];
    const client = new TtrssClient({
      transport: fakeServer(),
      hooks: { onError: (op, error) => errors.push(`${op}: ${String(error)}`) },
    });
    await expect(client.login({ ...conn, password: "wrong" })).rejects.toBeInstanceOf(AuthError);
    expect(errors).toEqual([
      `login: AuthError: failed to log in at ${TEST_ENDPOINT} as admin: LOGIN_ERROR`,
    ]);
  });

  test("reports calls made before login through onError", async () => {
    const errors: string[] = [];
    const transport = fakeServer();
    const client = new TtrssClient({
      transport,
      hooks: { onError: (op, error) => errors.push(`${op}: ${String(error)}`) },
    });
    await expect(client.call("getFeedTree")).rejects.toBeInstanceOf(AuthError);
    expect(errors).toEqual(["getFeedTree: AuthError: cannot call getFeedTree: not logged in"]);
    expect(transport.requests).toHaveLength(0);
  });
});
