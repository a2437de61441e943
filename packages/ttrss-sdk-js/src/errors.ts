import type { FeedTreeItem } from "./feed_tree";

export class TtrssError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Connection-level failure; the request may or may not have reached the server.
export class TransportError extends TtrssError {}

export class ProtocolError extends TtrssError {}

export class AuthError extends TtrssError {}

export class ApiError extends TtrssError {
  constructor(
    readonly op: string,
    readonly apiMessage: string,
  ) {
    super(`${op} failed: ${apiMessage}`);
  }
}

export class NotFoundError extends TtrssError {
  constructor(readonly catpath: string) {
    super(`not found: ${JSON.stringify(catpath)}`);
  }
}

export class AmbiguousPathError extends TtrssError {
  constructor(
    readonly catpath: string,
    readonly candidates: readonly FeedTreeItem[],
  ) {
    super(
      `ambiguous path ${JSON.stringify(catpath)}: matches both a category and a feed; ` +
        `add a trailing "/" to pick the category`,
    );
  }
}

// A name that cannot be written as a non-final catpath component.
export class CatPathError extends TtrssError {
  constructor(readonly component: string) {
    super(`cannot write ${JSON.stringify(component)} before a "/": it ends in "\\"`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
