import { loadConfig, type DemoConfig } from "./config";
import { runDemo, type DemoOptions } from "./demo";
import { MissingCredentialsError, RedditApiError, UsageError } from "./errors";
import { initializeReddit } from "./reddit";
import type { LineWriter } from "./report";
import type { ThreadSource } from "./types/reddit";

export const DEFAULT_LIMIT = 5;
export const MAX_LIMIT = 100;

export const USAGE = `Degen Index Reddit API Demo - Fetch and classify comments from one thread

Usage:
  degen-index-demo --submission-id <id> [--limit <n>]

Options:
  --submission-id <id>  Reddit submission id, t3_ fullname, or thread URL (required)
  --limit <n>           Number of top-level comments to fetch (default: ${DEFAULT_LIMIT}, max: ${MAX_LIMIT})
  --help, -h            Show this help message

Examples:
  degen-index-demo --submission-id 1k0abc123
  degen-index-demo --submission-id 1k0abc123 --limit 10

Environment variables:
  REDDIT_CLIENT_ID      Your Reddit app client ID
  REDDIT_CLIENT_SECRET  Your Reddit app client secret
  REDDIT_USER_AGENT     Optional custom user agent (default: DegenIndexDemo/0.1)`;

export interface CliOptions extends DemoOptions {
  help: boolean;
}

export interface CliDeps {
  createClient?: (config: DemoConfig) => ThreadSource;
  write?: LineWriter;
  writeError?: LineWriter;
}

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

const THREAD_URL = /\/comments\/([A-Za-z0-9]+)/;

export function normalizeSubmissionId(input: string): string {
  const trimmed = input.trim();
  const fromUrl = THREAD_URL.exec(trimmed);
  const id = (fromUrl ? fromUrl[1] : trimmed).replace(/^t3_/i, "");

  if (!/^[A-Za-z0-9]+$/.test(id)) {
    throw new UsageError(`Invalid submission id "${input}"`);
  }
  return id.toLowerCase();
}

function parseLimit(value: string): number {
  const limit = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
    throw new UsageError(`--limit must be an integer between 1 and ${MAX_LIMIT}`);
  }
  return limit;
}

export function parseArgs(argv: string[]): CliOptions {
  let submissionId: string | undefined;
  let limit = DEFAULT_LIMIT;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : arg.slice(eq + 1);

    const takeValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("-")) {
        throw new UsageError(`${flag} requires a value`);
      }
      i += 1;
      return next;
    };

    switch (flag) {
      case "--help":
      case "-h":
        help = true;
        break;
      case "--submission-id":
        submissionId = normalizeSubmissionId(takeValue());
        break;
      case "--limit":
        limit = parseLimit(takeValue());
        break;
      default:
        throw new UsageError(
          flag.startsWith("-") ? `Unknown option ${flag}` : `Unexpected argument "${arg}"`
        );
    }
  }

  if (help) {
    return { help, submissionId: submissionId ?? "", limit };
  }
  if (!submissionId) {
    throw new UsageError("--submission-id is required");
  }
  return { help, submissionId, limit };
}

export async function main(
  argv: string[],
  env: EnvSource,
  deps: CliDeps = {}
): Promise<number> {
  const write = deps.write ?? ((line: string) => console.log(line));
  const writeError = deps.writeError ?? ((line: string) => console.error(line));
  const createClient = deps.createClient ?? initializeReddit;

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      writeError(`❌ ${error.message}`);
      writeError("");
      writeError(USAGE);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    write(USAGE);
    return 0;
  }

  let config: DemoConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof MissingCredentialsError) {
      writeError(`❌ ${error.message}`);
      writeError("Please set REDDIT_CLIENT_ID and REDDIT_CLIENT_SECRET environment variables.");
      writeError("To get credentials, create an app at: https://www.reddit.com/prefs/apps");
      return 1;
    }
    throw error;
  }

  const client = createClient(config);
  write(`🔐 Using app-only OAuth as "${config.userAgent}"`);

  try {
    await runDemo(options, client, write);
    return 0;
  } catch (error) {
    if (error instanceof RedditApiError) {
      writeError(`❌ Could not fetch submission '${options.submissionId}'`);
      writeError(`Details: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
