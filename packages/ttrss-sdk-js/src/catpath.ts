import type { TtrssClient } from "./client";
import { AmbiguousPathError, CatPathError, NotFoundError } from "./errors";
import {
  fetchFeedTree,
  type CategoryItem,
  type FeedTreeItem,
  type FeedTreeKind,
} from "./feed_tree";

export const CATPATH_SEPARATOR = "/";
export const CATPATH_ESCAPE = "\\";

export interface ParsedCatPath {
  components: string[];
  // Set by an unescaped trailing separator: the last component must name a category.
  categoryOnly: boolean;
}

export function parseCatPath(path: string): ParsedCatPath {
  const components: string[] = [];
  let current = "";
  let endedOnSeparator = false;

  for (let i = 0; i < path.length; i += 1) {
    const ch = path[i];
    if (ch === CATPATH_ESCAPE && path[i + 1] === CATPATH_SEPARATOR) {
      current += CATPATH_SEPARATOR;
      endedOnSeparator = false;
      i += 1;
      continue;
    }
    if (ch === CATPATH_SEPARATOR) {
      if (current) {
        components.push(current);
      }
      current = "";
      endedOnSeparator = true;
      continue;
    }
    current += ch;
    endedOnSeparator = false;
  }
  if (current) {
    components.push(current);
  }

  return { components, categoryOnly: endedOnSeparator && components.length > 0 };
}

export function pathComponents(path: string): string[] {
  return parseCatPath(path).components;
}

export function escapeComponent(name: string): string {
  return name.split(CATPATH_SEPARATOR).join(`${CATPATH_ESCAPE}${CATPATH_SEPARATOR}`);
}

// A trailing escape would swallow the separator after it, so such a name can only end a path.
export function isTerminalOnly(name: string): boolean {
  return name.endsWith(CATPATH_ESCAPE);
}

export function formatCatPath(components: readonly string[]): string {
  const last = components.length - 1;
  return components
    .map((component, index) => {
      if (index < last && isTerminalOnly(component)) {
        throw new CatPathError(component);
      }
      return escapeComponent(component);
    })
    .join(CATPATH_SEPARATOR);
}

export type CatPathResolution =
  | { kind: "found"; item: FeedTreeItem; trail: FeedTreeItem[] }
  | { kind: "not_found" }
  | { kind: "ambiguous"; candidates: FeedTreeItem[] };

export interface ResolveCatPathOptions {
  // Restrict the final component to one kind; a trailing "/" always means "category".
  expect?: FeedTreeKind;
}

const NOT_FOUND: CatPathResolution = { kind: "not_found" };

function resolveFrom(
  category: CategoryItem,
  remaining: readonly string[],
  trail: FeedTreeItem[],
  expect: FeedTreeKind | undefined,
): CatPathResolution {
  const [head, ...rest] = remaining;
  if (head === undefined) {
    return { kind: "found", item: category, trail };
  }
  const named = category.items.filter((item) => item.name === head);

  if (rest.length > 0) {
    for (const item of named) {
      if (item.kind !== "category") {
        continue;
      }
      const result = resolveFrom(item, rest, [...trail, item], expect);
      if (result.kind !== "not_found") {
        return result;
      }
    }
    return NOT_FOUND;
  }

  const candidates = expect ? named.filter((item) => item.kind === expect) : named;
  const [first] = candidates;
  if (!first) {
    return NOT_FOUND;
  }
  if (candidates.some((item) => item.kind !== first.kind)) {
    return { kind: "ambiguous", candidates };
  }
  return { kind: "found", item: first, trail: [...trail, first] };
}

// A category and a feed sharing the final name is ambiguous unless the path or `expect` names the kind.
export function resolveInTree(
  root: CategoryItem,
  catpath: string,
  options: ResolveCatPathOptions = {},
): CatPathResolution {
  const parsed = parseCatPath(catpath);
  if (parsed.categoryOnly && options.expect === "feed") {
    return NOT_FOUND;
  }
  const expect = parsed.categoryOnly ? "category" : options.expect;
  if (parsed.components.length === 0 && expect === "feed") {
    return NOT_FOUND;
  }
  return resolveFrom(root, parsed.components, [], expect);
}

export async function resolveCatPath(
  client: TtrssClient,
  catpath: string,
  options: ResolveCatPathOptions = {},
): Promise<FeedTreeItem> {
  const root = await fetchFeedTree(client, { includeEmpty: true });
  const result = resolveInTree(root, catpath, options);
  switch (result.kind) {
    case "found":
      return result.item;
    case "ambiguous":
      throw new AmbiguousPathError(catpath, result.candidates);
    case "not_found":
      throw new NotFoundError(catpath);
  }
}
