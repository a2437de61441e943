import {
  AmbiguousPathError,
  NotFoundError,
  SubscribeStatus,
  escapeComponent,
  fetchFeedTree,
  isPseudoCategory,
  isTerminalOnly,
  isVirtualFeed,
  resolveCatPath,
  resolveInTree,
  subscribe,
  unsubscribe,
  walkFeedTree,
  type FeedTreeItem,
  type FeedTreeKind,
  type TtrssClient,
} from "ttrss-sdk-js";

import { EX_DATAERR, EX_SUCCESS } from "./exit_codes";
import type { CliIo } from "./io";

export interface LsOptions {
  recursive?: boolean;
}

export interface LnOptions {
  feedLogin?: string;
  feedPassword?: string;
}

// Categories end in "/" unless the name ends in a backslash, which a following "/" would turn into an escape.
export function displayName(item: FeedTreeItem): string {
  const name = escapeComponent(item.name);
  return item.kind === "category" && !isTerminalOnly(item.name) ? `${name}/` : name;
}

export function listing(item: FeedTreeItem, recursive: boolean): string[] {
  if (item.kind === "feed") {
    return [displayName(item)];
  }
  const lines: string[] = [];
  walkFeedTree(item, (child, depth) => {
    lines.push(`${"  ".repeat(depth)}${displayName(child)}`);
    return recursive ? "continue" : "skip";
  });
  return lines;
}

export async function runLs(
  client: TtrssClient,
  catpaths: readonly string[],
  options: LsOptions,
  io: CliIo,
): Promise<number> {
  const targets = catpaths.length > 0 ? catpaths : ["/"];
  for (const [index, catpath] of targets.entries()) {
    const item = await resolveCatPath(client, catpath);
    if (targets.length > 1) {
      io.stdout.write(`${index > 0 ? "\n" : ""}${catpath}:\n`);
    }
    for (const line of listing(item, options.recursive ?? false)) {
      io.stdout.write(`${line}\n`);
    }
  }
  return EX_SUCCESS;
}

// Undefined when the path names only a node of the other kind.
async function resolveTarget(
  client: TtrssClient,
  catpath: string,
  kind: FeedTreeKind,
): Promise<FeedTreeItem | undefined> {
  const root = await fetchFeedTree(client, { includeEmpty: true });
  const result = resolveInTree(root, catpath, { expect: kind });
  if (result.kind === "found") {
    return result.item;
  }
  if (result.kind === "ambiguous") {
    throw new AmbiguousPathError(catpath, result.candidates);
  }
  if (resolveInTree(root, catpath).kind !== "not_found") {
    return undefined;
  }
  throw new NotFoundError(catpath);
}

export async function runLn(
  client: TtrssClient,
  feedUrl: string,
  catpath: string,
  options: LnOptions,
  io: CliIo,
): Promise<number> {
  const target = await resolveTarget(client, catpath, "category");
  if (!target || target.kind !== "category" || isPseudoCategory(target)) {
    io.stderr.write(`ttrss-tool: cannot subscribe into ${JSON.stringify(catpath)}: not a real category\n`);
    return EX_DATAERR;
  }

  const { subscribed, outcome } = await subscribe(client, {
    feedUrl,
    categoryId: target.bareId,
    login: options.feedLogin,
    password: options.feedPassword,
  });
  if (outcome.code !== SubscribeStatus.ADDED && outcome.message) {
    io.stderr.write(`${outcome.message}\n`);
  }
  return subscribed ? EX_SUCCESS : EX_DATAERR;
}

export async function runRm(client: TtrssClient, catpath: string, io: CliIo): Promise<number> {
  const target = await resolveTarget(client, catpath, "feed");
  if (!target || target.kind !== "feed" || isVirtualFeed(target)) {
    io.stderr.write(`ttrss-tool: cannot unsubscribe from ${JSON.stringify(catpath)}: not a real feed\n`);
    return EX_DATAERR;
  }
  await unsubscribe(client, target.bareId);
  return EX_SUCCESS;
}
