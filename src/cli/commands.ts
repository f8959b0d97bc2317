import { openDatabase } from "../db";
import { errorMessage } from "../errors";
import { DuplicateCleaner } from "../services/cleaner";
import { ConfigStore } from "../services/config";
import {
  DEFAULT_DB_FILE,
  parseEnv,
  resolveSettings,
} from "../services/settings";
import { TokenManager } from "../services/token-manager";
import { TokenFile } from "../services/token-store";
import { TraktClient, type HistoryApi } from "../services/trakt";
import type { Settings } from "../types";
import { formatDuplicateList, formatSummary } from "../utils/report";
import { parseOptions, resolveTypes } from "./options";
import pkg from "../../package.json";

export interface TraktSession {
  authenticate(): Promise<unknown>;
  api: HistoryApi;
}

export interface CliContext {
  env: Record<string, string | undefined>;
  /** Whether stdin is a terminal that can answer prompts. */
  interactive: boolean;
  ask: (question: string) => Promise<string>;
  confirm: (question: string) => Promise<boolean>;
  connect?: (settings: Settings) => TraktSession;
}

function connectTrakt(settings: Settings): TraktSession {
  const tokens = new TokenManager({
    clientId: settings.clientId,
    clientSecret: settings.clientSecret,
    apiUrl: settings.apiUrl,
    store: new TokenFile(settings.tokenFile),
  });
  return {
    authenticate: () => tokens.authenticate(),
    api: new TraktClient(tokens, settings.username),
  };
}

function printHelp() {
  console.log(`
Trakt Dedupe CLI v${pkg.version}

Usage:
  trakt-dedupe <command> [options]

Commands:
  auth                    Authenticate with Trakt (device code)
  duplicates [type]       List duplicates (type: movies, episodes, all)
  help                    Show this help

Options:
  --fix                   Remove the duplicates found (asks for confirmation)
  --yes                   Skip the confirmation prompt
  --daily                 Keep one play per day (multiple plays on the same day are duplicates)
  --type <type>           Specify 'movies', 'episodes' or 'all'
`);
}

/** Run one CLI invocation and return its exit code. */
export async function runCli(
  argv: string[],
  context: CliContext,
): Promise<number> {
  const command = argv[0];
  if (!command || command === "help") {
    printHelp();
    return 0;
  }
  if (command !== "auth" && command !== "duplicates") {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  const opts = parseOptions(argv.slice(1));
  const fix = opts.flags.fix === true;
  const skipPrompt = opts.flags.yes === true;

  if (command === "duplicates") {
    if (!resolveTypes(opts)) {
      console.error("Invalid type. Must be 'movies', 'episodes' or 'all'.");
      return 1;
    }
    if (fix && !skipPrompt && !context.interactive) {
      console.error("--fix needs --yes when stdin is not a terminal.");
      return 1;
    }
  }

  try {
    const env = parseEnv(context.env);
    const db = openDatabase(env.DB_FILE_NAME ?? DEFAULT_DB_FILE);
    const settings = await resolveSettings({
      env: context.env,
      store: new ConfigStore(db),
      prompt: context.interactive ? context.ask : undefined,
      keepPerDay: opts.flags.daily === true ? true : undefined,
    });
    const session = (context.connect ?? connectTrakt)(settings);

    if (command === "auth") {
      await session.authenticate();
      return 0;
    }

    const types = resolveTypes(opts) ?? [];
    const cleaner = new DuplicateCleaner(session.api, {
      keepPerDay: settings.keepPerDay,
    });
    const reports = await cleaner.run(types, {
      dryRun: !fix,
      confirm: skipPrompt
        ? undefined
        : async (scans, total) => {
            for (const line of formatDuplicateList(scans)) console.log(line);
            return context.confirm(`Delete ${total} items?`);
          },
    });

    if (!fix || skipPrompt) {
      for (const line of formatDuplicateList(reports)) console.log(line);
    }
    for (const line of formatSummary(reports)) console.log(line);

    return reports.every((report) => report.error) ? 1 : 0;
  } catch (e) {
    console.error("An error occurred:", errorMessage(e));
    return 1;
  }
}
