import { z } from "zod";
import { MissingCredentialsError } from "./errors";
import type { RedditCredentials } from "./types/reddit";

export const DEFAULT_USER_AGENT = "DegenIndexDemo/0.1";

const CREDENTIAL_VARIABLES = ["REDDIT_CLIENT_ID", "REDDIT_CLIENT_SECRET"] as const;

const envSchema = z.object({
  REDDIT_CLIENT_ID: z.string().trim().min(1),
  REDDIT_CLIENT_SECRET: z.string().trim().min(1),
  REDDIT_USER_AGENT: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || DEFAULT_USER_AGENT),
});

export type DemoConfig = RedditCredentials;

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

export function loadConfig(env: EnvSource = process.env): DemoConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
    throw new MissingCredentialsError(
      CREDENTIAL_VARIABLES.filter((name) => invalid.has(name))
    );
  }

  return {
    clientId: result.data.REDDIT_CLIENT_ID,
    clientSecret: result.data.REDDIT_CLIENT_SECRET,
    userAgent: result.data.REDDIT_USER_AGENT,
  };
}
