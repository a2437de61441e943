import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { posix } from "node:path";

import { describeError, isJsonObject } from "ttrss-sdk-js";

export const DEFAULT_USER = "admin";
export const DOTFILE_SUBPATH = "ttrss-tool/config";

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export type Env = Record<string, string | undefined>;

export interface ConfigFs {
  exists(path: string): boolean;
  readFile(path: string): Promise<string>;
}

export const nodeConfigFs: ConfigFs = {
  exists: existsSync,
  readFile: (path) => readFile(path, "utf8"),
};

export interface ConnectionFlags {
  addr?: string;
  user?: string;
  pass?: string;
  dotfile?: string;
}

export interface DotfileSettings {
  addr?: string;
  user?: string;
  pass?: string;
}

export interface Settings {
  addr: string;
  user: string;
  pass: string;
}

// Searches $XDG_CONFIG_HOME (or ~/.config), then $XDG_CONFIG_DIRS; relative directories are skipped.
export function xdgConfigSearch(
  subpath: string,
  env: Env,
  fs: ConfigFs,
  onlyIfExists = false,
): string | undefined {
  const dirs = [env.XDG_CONFIG_HOME || posix.join(env.HOME ?? "", ".config")];
  if (env.XDG_CONFIG_DIRS) {
    dirs.push(...env.XDG_CONFIG_DIRS.split(":"));
  }

  let fallback: string | undefined;
  for (const dir of dirs) {
    if (!posix.isAbsolute(dir) || !fs.exists(dir)) {
      continue;
    }
    const candidate = posix.join(dir, subpath);
    fallback ??= candidate;
    if (fs.exists(candidate)) {
      return candidate;
    }
  }
  return onlyIfExists ? undefined : fallback;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

// A missing dotfile is not an error; an unreadable or malformed one is.
export async function loadDotfile(path: string, fs: ConfigFs): Promise<DotfileSettings> {
  let text: string;
  try {
    text = await fs.readFile(path);
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw new ConfigError(`unable to read dotfile [${path}]: ${describeError(error)}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`unable to parse contents of dotfile [${path}]: ${describeError(error)}`, {
      cause: error,
    });
  }
  if (!isJsonObject(parsed)) {
    throw new ConfigError(`unable to parse contents of dotfile [${path}]: expected a JSON object`);
  }

  const settings: DotfileSettings = {};
  for (const [key, value] of Object.entries(parsed)) {
    const field = key.toLowerCase();
    if (field !== "addr" && field !== "user" && field !== "pass") {
      continue;
    }
    if (typeof value !== "string") {
      throw new ConfigError(`dotfile [${path}]: ${JSON.stringify(key)} must be a string`);
    }
    settings[field] = value;
  }
  return settings;
}

// Command-line values win; the dotfile only fills what was left unset.
export function mergeSettings(flags: ConnectionFlags, dotfile: DotfileSettings): Settings {
  return {
    addr: flags.addr || dotfile.addr || "",
    user: flags.user || dotfile.user || DEFAULT_USER,
    pass: flags.pass || dotfile.pass || "",
  };
}

export async function loadSettings(
  flags: ConnectionFlags,
  env: Env,
  fs: ConfigFs = nodeConfigFs,
): Promise<Settings> {
  const path = flags.dotfile || xdgConfigSearch(DOTFILE_SUBPATH, env, fs);
  const dotfile = path ? await loadDotfile(path, fs) : {};
  return mergeSettings(flags, dotfile);
}
