import type { TtrssClient } from "./client";
import { getNumber, getObject, getString, type JsonObject, type RequestParams } from "./codec";
import { ProtocolError } from "./errors";

export const SubscribeStatus = {
  ALREADY_SUBSCRIBED: 0,
  ADDED: 1,
  INVALID_URL: 2,
  HTML_NO_FEED_LINK: 3,
  HTML_MULTIPLE_FEED_LINKS: 4,
  FETCH_FAILED: 5,
  INVALID_FEED_DOCUMENT: 6,
} as const;

export type SubscribeStatusCode = (typeof SubscribeStatus)[keyof typeof SubscribeStatus];

const STATUS_DESCRIPTIONS: Record<SubscribeStatusCode, string> = {
  0: "already subscribed to this feed",
  1: "subscribed",
  2: "invalid URL",
  3: "URL content is HTML with no feed link",
  4: "URL content is HTML with multiple feed links",
  5: "could not download the URL",
  6: "URL content is not a valid feed document",
};

export interface SubscribeOutcome {
  readonly code: SubscribeStatusCode;
  readonly message: string;
  readonly feedId?: number;
}

export interface SubscribeRequest {
  feedUrl: string;
  categoryId?: number;
  // Credentials for feeds that require HTTP authentication.
  login?: string;
  password?: string;
}

export interface SubscribeResult {
  subscribed: boolean;
  outcome: SubscribeOutcome;
}

export function isSubscribeStatusCode(value: number): value is SubscribeStatusCode {
  return Object.values<number>(SubscribeStatus).includes(value);
}

export function isSubscribed(code: SubscribeStatusCode): boolean {
  return code === SubscribeStatus.ALREADY_SUBSCRIBED || code === SubscribeStatus.ADDED;
}

export function describeSubscribeStatus(code: SubscribeStatusCode): string {
  return STATUS_DESCRIPTIONS[code];
}

export function decodeSubscribeOutcome(content: JsonObject): SubscribeOutcome {
  const status = getObject(content, "status");
  if (!status) {
    throw new ProtocolError("unexpected result from API: subscribeToFeed returned no status");
  }
  const code = getNumber(status, "code");
  if (code === undefined || !isSubscribeStatusCode(code)) {
    throw new ProtocolError(
      `unexpected result from API: subscribeToFeed status code ${JSON.stringify(status.code ?? null)}`,
    );
  }

  let message = getString(status, "message") ?? "";
  if (!message && !isSubscribed(code)) {
    message = describeSubscribeStatus(code);
  }
  const feedId = getNumber(status, "feed_id");
  return feedId === undefined ? { code, message } : { code, message, feedId };
}

export async function subscribe(
  client: TtrssClient,
  request: SubscribeRequest,
): Promise<SubscribeResult> {
  const params: RequestParams = {
    feed_url: request.feedUrl,
    category_id: request.categoryId ?? 0,
  };
  if (request.login !== undefined) {
    params.login = request.login;
  }
  if (request.password !== undefined) {
    params.password = request.password;
  }

  const content = await client.callOk("subscribeToFeed", params);
  const outcome = decodeSubscribeOutcome(content);
  return { subscribed: isSubscribed(outcome.code), outcome };
}

export async function unsubscribe(client: TtrssClient, feedId: number): Promise<void> {
  const content = await client.callOk("unsubscribeFeed", { feed_id: feedId });
  const status = getString(content, "status");
  if (status !== "OK") {
    throw new ProtocolError(
      `unexpected result from API: unsubscribeFeed status ${JSON.stringify(status ?? null)}`,
    );
  }
}
