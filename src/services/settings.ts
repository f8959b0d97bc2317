import { z } from "zod";
import { ConfigurationError } from "../errors";
import type { Credentials, Settings } from "../types";
import type { ConfigStore } from "./config";

export const TRAKT_API = "https://api.trakt.tv";
export const DEFAULT_TOKEN_FILE = "trakt_auth.json";
export const DEFAULT_DB_FILE = "trakt.db";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes")
  .optional();

const envSchema = z.object({
  TRAKT_CLIENT_ID: optionalString,
  TRAKT_CLIENT_SECRET: optionalString,
  TRAKT_USERNAME: optionalString,
  TRAKT_KEEP_PER_DAY: booleanFlag,
  TRAKT_TOKEN_FILE: optionalString,
  TRAKT_API_URL: optionalString,
  DB_FILE_NAME: optionalString,
});

type Env = z.infer<typeof envSchema>;

const storedCredentialsSchema = z
  .object({
    client_id: z.string(),
    client_secret: z.string(),
    username: z.string(),
  })
  .partial();

interface CredentialField {
  env: "TRAKT_CLIENT_ID" | "TRAKT_CLIENT_SECRET" | "TRAKT_USERNAME";
  label: string;
  placeholder: string;
}

const CREDENTIAL_FIELDS: Record<keyof Credentials, CredentialField> = {
  client_id: {
    env: "TRAKT_CLIENT_ID",
    label: "Client ID: ",
    placeholder: "your_client_id",
  },
  client_secret: {
    env: "TRAKT_CLIENT_SECRET",
    label: "Client Secret: ",
    placeholder: "your_client_secret",
  },
  username: {
    env: "TRAKT_USERNAME",
    label: "Username: ",
    placeholder: "your_username",
  },
};

const CREDENTIAL_KEYS: (keyof Credentials)[] = [
  "client_id",
  "client_secret",
  "username",
];

export interface ResolveSettingsOptions {
  env: Record<string, string | undefined>;
  store?: ConfigStore;
  /** Asks for credentials that are still missing; omitted when stdin is not a TTY. */
  prompt?: (question: string) => Promise<string>;
  keepPerDay?: boolean;
}

export function parseEnv(env: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

function isUsable(value: string | undefined, placeholder: string) {
  return !!value && value !== placeholder;
}

function requireCredential(
  key: keyof Credentials,
  value: string | undefined,
): string {
  const field = CREDENTIAL_FIELDS[key];
  if (!value) {
    throw new ConfigurationError(`Missing ${field.env}`);
  }
  if (value === field.placeholder) {
    throw new ConfigurationError(
      `${field.env} is still set to the placeholder "${field.placeholder}"`,
    );
  }
  return value;
}

/**
 * Build the run's settings. Environment values win over the credentials
 * saved in the config table; anything still missing is prompted for (and
 * saved) when a prompt is available.
 */
export async function resolveSettings(
  options: ResolveSettingsOptions,
): Promise<Settings> {
  const env = parseEnv(options.env);
  const stored = storedCredentialsSchema.safeParse(
    options.store ? await options.store.getJsonConfig("credentials") : null,
  );
  const saved: Partial<Credentials> = stored.success ? stored.data : {};

  const creds: Partial<Credentials> = {};
  for (const key of CREDENTIAL_KEYS) {
    creds[key] = env[CREDENTIAL_FIELDS[key].env] ?? saved[key];
  }

  const missing = CREDENTIAL_KEYS.filter(
    (key) => !isUsable(creds[key], CREDENTIAL_FIELDS[key].placeholder),
  );
  if (missing.length > 0 && options.prompt) {
    console.log("First time setup - Enter Trakt Credentials");
    for (const key of missing) {
      creds[key] = (await options.prompt(CREDENTIAL_FIELDS[key].label)).trim();
    }
    if (options.store) {
      await options.store.setJsonConfig("credentials", creds);
    }
  }

  return {
    clientId: requireCredential("client_id", creds.client_id),
    clientSecret: requireCredential("client_secret", creds.client_secret),
    username: requireCredential("username", creds.username),
    keepPerDay: options.keepPerDay ?? env.TRAKT_KEEP_PER_DAY ?? false,
    tokenFile: env.TRAKT_TOKEN_FILE ?? DEFAULT_TOKEN_FILE,
    apiUrl: (env.TRAKT_API_URL ?? TRAKT_API).replace(/\/+$/, ""),
  };
}
