import { Command, CommanderError } from "commander";
import {
  TtrssClient,
  describeError,
  type HttpTransport,
  type TtrssClientHooks,
} from "ttrss-sdk-js";

import { runLn, runLs, runRm, type LnOptions, type LsOptions } from "./commands";
import { DEFAULT_USER, loadSettings, nodeConfigFs, type ConfigFs, type Env } from "./config";
import { EX_SUCCESS, EX_USAGE, exitCodeFor } from "./exit_codes";
import type { CliIo, TextSink } from "./io";
import { readPassword } from "./password";

export const PROGRAM_NAME = "ttrss-tool";

export interface CliDeps extends CliIo {
  env: Env;
  fs?: ConfigFs;
  transport?: HttpTransport;
}

type GlobalOptions = {
  addr?: string;
  user?: string;
  pass?: string;
  dotfile?: string;
  verbose?: boolean;
};

export function traceHooks(sink: TextSink): TtrssClientHooks {
  return {
    onCall: (op, params) => sink.write(`### issuing call: ${op} ${JSON.stringify(params)}\n`),
    onLogin: (user, session) => sink.write(`### logged in as ${user} at ${session.endpoint}\n`),
    onResponse: (op, envelope) => sink.write(`### ${op} returned status ${envelope.status}\n`),
  };
}

async function withSession(
  command: Command,
  deps: CliDeps,
  run: (client: TtrssClient) => Promise<number>,
): Promise<number> {
  const flags = command.optsWithGlobals<GlobalOptions>();
  try {
    const settings = await loadSettings(flags, deps.env, deps.fs ?? nodeConfigFs);
    if (!settings.addr.startsWith("http")) {
      deps.stderr.write(
        `${PROGRAM_NAME}: error: address ${JSON.stringify(settings.addr)} must start with "http"\n`,
      );
      return EX_USAGE;
    }
    const password = settings.pass || (await readPassword(deps.stdin, deps.stdout));

    const client = new TtrssClient({
      transport: deps.transport,
      hooks: flags.verbose ? traceHooks(deps.stderr) : {},
    });
    await client.login({ hostUrl: settings.addr, user: settings.user, password });
    return await run(client);
  } catch (error) {
    deps.stderr.write(`${PROGRAM_NAME}: ${describeError(error)}\n`);
    return exitCodeFor(error);
  }
}

export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const program = new Command()
    .name(PROGRAM_NAME)
    .description("Manage Tiny Tiny RSS subscriptions: categories are directories, feeds are files.")
    .option("-a, --addr <url>", "address (example: https://example.com/tt-rss/)")
    .option("-u, --user <name>", `user to connect as (default: "${DEFAULT_USER}")`)
    .option("-p, --pass <password>", "password to use")
    .option("--dotfile <path>", "dotfile path (defaults to $XDG_CONFIG_HOME/ttrss-tool/config)")
    .option("-v, --verbose", "trace API calls on stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout.write(text),
      writeErr: (text) => deps.stderr.write(text),
    });

  program
    .command("ls")
    .description("list categories and feeds")
    .argument("[catpath...]", "categories or feeds to list (default: /)")
    .option("-R, --recursive", "recurse into categories")
    .action(async (catpaths: string[], options: LsOptions, command: Command) => {
      setExitCode(await withSession(command, deps, (client) => runLs(client, catpaths, options, deps)));
    });

  program
    .command("ln")
    .description("subscribe to a new feed")
    .argument("<feed-url>", "feed or site address")
    .argument("[catpath]", "category to subscribe into (default: uncategorized)")
    .option("--feed-login <user>", "user name the feed requires")
    .option("--feed-password <password>", "password the feed requires")
    .action(
      async (feedUrl: string, catpath: string | undefined, options: LnOptions, command: Command) => {
        setExitCode(
          await withSession(command, deps, (client) =>
            runLn(client, feedUrl, catpath ?? "", options, deps),
          ),
        );
      },
    );

  program
    .command("rm")
    .description("unsubscribe from a feed")
    .argument("<catpath>", "feed to unsubscribe from")
    .action(async (catpath: string, _options: unknown, command: Command) => {
      setExitCode(await withSession(command, deps, (client) => runRm(client, catpath, deps)));
    });

  return program;
}

export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let exitCode = EX_SUCCESS;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EX_SUCCESS : EX_USAGE;
    }
    throw error;
  }
  return exitCode;
}
