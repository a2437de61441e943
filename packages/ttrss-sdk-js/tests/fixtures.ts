import { isJsonObject, type JsonObject, type JsonValue } from "../src/codec";
import { InMemoryHttpTransport, type HttpResponse } from "../src/transports";

export const TEST_HOST = "https://rss.example/tt-rss";
export const TEST_ENDPOINT = "https://rss.example/tt-rss/api/";
export const TEST_USER = "admin";
export const TEST_PASSWORD = "test-secret";
export const TEST_SESSION_ID = "test-session";

export function envelope(content: JsonValue, status = 0, seq: number | null = 0): HttpResponse {
  return { status: 200, body: JSON.stringify({ seq, status, content }) };
}

export function requestBody(body: string): JsonObject {
  const parsed: unknown = JSON.parse(body);
  if (!isJsonObject(parsed)) {
    throw new Error("request body is not an object");
  }
  return parsed;
}

//   Special (CAT:-1)      -> All articles (FEED:-4)
//   News (CAT:3)          -> Daily (FEED:10), Tech (CAT:4) -> Gadgets (FEED:11), a/b (CAT:5)
//   A (CAT:7)             -> x (FEED:20)
//   A (FEED:21)
//   Empty (CAT:8)
export function sampleTreeContent(): JsonObject {
  return {
    categories: {
      identifier: "id",
      label: "name",
      items: [
        {
          id: "CAT:-1",
          bare_id: -1,
          type: "category",
          name: "Special",
          items: [{ id: "FEED:-4", bare_id: -4, type: "feed", name: "All articles", unread: 12 }],
        },
        {
          id: "CAT:3",
          bare_id: 3,
          type: "category",
          name: "News",
          unread: 4,
          items: [
            {
              id: "FEED:10",
              bare_id: 10,
              type: "feed",
              name: "Daily",
              unread: 4,
              param: "Updated 2 hours ago",
              error: "",
            },
            {
              id: "CAT:4",
              bare_id: 4,
              type: "category",
              name: "Tech",
              items: [
                {
                  id: "FEED:11",
                  bare_id: 11,
                  type: "feed",
                  name: "Gadgets",
                  error: "HTTP 404",
                },
              ],
            },
            { id: "CAT:5", bare_id: 5, type: "category", name: "a/b", items: [] },
          ],
        },
        {
          id: "CAT:7",
          bare_id: 7,
          type: "category",
          name: "A",
          items: [{ id: "FEED:20", bare_id: 20, type: "feed", name: "x" }],
        },
        { id: "FEED:21", bare_id: 21, type: "feed", name: "A" },
        { id: "CAT:8", bare_id: 8, type: "category", name: "Empty", items: [] },
      ],
    },
  };
}

export interface FakeServerOptions {
  tree?: JsonObject;
  subscribeStatus?: JsonObject;
}

const KNOWN_FEEDS = new Set([10, 11, 20, 21]);

// In-process stand-in for the server's /api/ endpoint.
export function fakeServer(options: FakeServerOptions = {}): InMemoryHttpTransport {
  return new InMemoryHttpTransport((request) => {
    const body = requestBody(request.body);
    if (body.op === "login") {
      if (body.user === TEST_USER && body.password === TEST_PASSWORD) {
        return envelope({ session_id: TEST_SESSION_ID, api_level: 18 });
      }
      return envelope({ error: "LOGIN_ERROR" }, 1);
    }
    if (body.sid !== TEST_SESSION_ID) {
      return envelope({ error: "NOT_LOGGED_IN" }, 1);
    }
    switch (body.op) {
      case "getFeedTree":
        return envelope(options.tree ?? sampleTreeContent());
      case "subscribeToFeed":
        return envelope({ status: options.subscribeStatus ?? { code: 1, feed_id: 42 } });
      case "unsubscribeFeed":
        return typeof body.feed_id === "number" && KNOWN_FEEDS.has(body.feed_id)
          ? envelope({ status: "OK" })
          : envelope({ error: "FEED_NOT_FOUND" }, 1);
      case "logout":
        return envelope({ status: "OK" });
      default:
        return envelope({ error: "UNKNOWN_METHOD" }, 1);
    }
  });
}
