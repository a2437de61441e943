import type { TtrssClient } from "./client";
import {
  getArray,
  getNumber,
  getObject,
  getString,
  isJsonObject,
  type JsonObject,
  type JsonValue,
} from "./codec";
import { ProtocolError } from "./errors";

export type FeedTreeKind = "category" | "feed";

interface FeedTreeNodeBase {
  // Composite id: "CAT:<bareId>" or "FEED:<bareId>".
  id: string;
  bareId: number;
  name: string;
  unread: number;
}

export interface CategoryItem extends FeedTreeNodeBase {
  kind: "category";
  items: FeedTreeItem[];
}

export interface FeedItem extends FeedTreeNodeBase {
  kind: "feed";
  auxText: string;
  lastError: string;
}

export type FeedTreeItem = CategoryItem | FeedItem;

export const ROOT_ID = "root";

// Server-defined categories that group virtual feeds; they are not real containers.
export const CAT_SPECIAL = -1;
export const CAT_LABELS = -2;
export const CAT_ALL_FEEDS = -3;
export const CAT_ALL_EXCLUDING_VIRTUAL = -4;

const KIND_TAGS: Record<FeedTreeKind, string> = {
  category: "CAT",
  feed: "FEED",
};

export function compositeId(kind: FeedTreeKind, bareId: number): string {
  return `${KIND_TAGS[kind]}:${bareId}`;
}

export function isPseudoCategory(item: FeedTreeItem): boolean {
  return item.kind === "category" && item.id !== ROOT_ID && item.bareId < 0;
}

export function isVirtualFeed(item: FeedTreeItem): boolean {
  return item.kind === "feed" && item.bareId < 0;
}

function parseCompositeId(id: string | undefined): { kind?: FeedTreeKind; bareId?: number } {
  if (!id) {
    return {};
  }
  const sep = id.indexOf(":");
  if (sep < 0) {
    return {};
  }
  const tag = id.slice(0, sep);
  const bare = Number(id.slice(sep + 1));
  const kind = tag === KIND_TAGS.category ? "category" : tag === KIND_TAGS.feed ? "feed" : undefined;
  return { kind, bareId: Number.isInteger(bare) ? bare : undefined };
}

function decodeKind(type: string | undefined, fromId: FeedTreeKind | undefined): FeedTreeKind | undefined {
  if (type === "category" || type === "feed") {
    return type;
  }
  return fromId;
}

function decodeItem(raw: JsonValue, where: string): FeedTreeItem {
  if (!isJsonObject(raw)) {
    throw new ProtocolError(`malformed feed tree node at ${where}`);
  }
  const rawId = getString(raw, "id");
  const parsedId = parseCompositeId(rawId);
  const kind = decodeKind(getString(raw, "type"), parsedId.kind);
  const bareId = getNumber(raw, "bare_id") ?? parsedId.bareId;
  if (!kind || bareId === undefined || !Number.isInteger(bareId)) {
    throw new ProtocolError(`feed tree node at ${where} has no recognisable kind or id`);
  }

  // The composite id is rebuilt so that it always agrees with kind and bareId.
  const base = {
    id: compositeId(kind, bareId),
    bareId,
    name: getString(raw, "name") ?? "",
    unread: getNumber(raw, "unread") ?? 0,
  };
  if (kind === "feed") {
    return {
      ...base,
      kind,
      auxText: getString(raw, "param") ?? "",
      lastError: getString(raw, "error") ?? "",
    };
  }
  const children = getArray(raw, "items") ?? [];
  return {
    ...base,
    kind,
    items: children.map((child, index) => decodeItem(child, `${where}.items[${index}]`)),
  };
}

// Decodes `getFeedTree` content into a synthetic root category.
export function decodeFeedTree(content: JsonObject): CategoryItem {
  const categories = getObject(content, "categories");
  if (!categories) {
    throw new ProtocolError("unexpected result from API: feed tree has no categories");
  }
  const items = getArray(categories, "items") ?? [];
  return {
    kind: "category",
    id: ROOT_ID,
    bareId: 0,
    name: "",
    unread: 0,
    items: items.map((raw, index) => decodeItem(raw, `items[${index}]`)),
  };
}

export interface FetchFeedTreeOptions {
  includeEmpty?: boolean;
}

export async function fetchFeedTree(
  client: TtrssClient,
  options: FetchFeedTreeOptions = {},
): Promise<CategoryItem> {
  const content = await client.callOk("getFeedTree", {
    include_empty: options.includeEmpty ?? false,
  });
  return decodeFeedTree(content);
}

export type WalkAction = "continue" | "skip" | "stop";

export type FeedTreeVisitor = (
  item: FeedTreeItem,
  depth: number,
  parents: readonly CategoryItem[],
) => WalkAction | void;

// Depth-first pre-order walk below `root`; false when the visitor stopped it.
export function walkFeedTree(root: CategoryItem, visit: FeedTreeVisitor): boolean {
  const walk = (category: CategoryItem, parents: CategoryItem[]): boolean => {
    for (const item of category.items) {
      const action = visit(item, parents.length, parents) ?? "continue";
      if (action === "stop") {
        return false;
      }
      if (action === "skip" || item.kind !== "category") {
        continue;
      }
      if (!walk(item, [...parents, item])) {
        return false;
      }
    }
    return true;
  };
  return walk(root, []);
}
