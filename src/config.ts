import { resolve } from "path";
import { homedir } from "os";
import { existsSync, readFileSync, statSync, mkdirSync, writeFileSync, chmodSync } from "fs";
import { Credentials, type CredentialsJson } from "./credentials.js";
import { DEFAULT_BASE_URL } from "./client/transport.js";
import { ValidationError } from "./errors.js";

export const ALL_SCOPES = [
  "threads_basic",
  "threads_content_publish",
  "threads_manage_insights",
  "threads_manage_replies",
  "threads_read_replies",
] as const;

export const DEFAULT_REDIRECT_URI = "https://localhost:3000/callback";

export interface OAuthConfig {
  appId: string;
  appSecret: string;
  redirectUri: string;
  scopes: readonly string[];
}

type Env = Record<string, string | undefined>;

function splitList(value: string | undefined): string[] {
  return (value ?? "").split(",").map((s) => s.trim()).filter(Boolean);
}

/**
 * Build the OAuth settings from explicit values, falling back to
 * THREADS_APP_ID, THREADS_APP_SECRET, THREADS_REDIRECT_URI and THREADS_SCOPES.
 */
export function resolveOAuthConfig(overrides: Partial<OAuthConfig> = {}, env: Env = process.env): OAuthConfig {
  const appId = overrides.appId || env.THREADS_APP_ID;
  const appSecret = overrides.appSecret || env.THREADS_APP_SECRET;

  if (!appId || !appSecret) {
    const missing: string[] = [];
    if (!appId) missing.push("THREADS_APP_ID");
    if (!appSecret) missing.push("THREADS_APP_SECRET");
    throw new ValidationError(`Missing OAuth settings: ${missing.join(", ")}`);
  }

  const scopes = overrides.scopes?.length ? [...overrides.scopes] : splitList(env.THREADS_SCOPES);

  return {
    appId,
    appSecret,
    redirectUri: overrides.redirectUri || env.THREADS_REDIRECT_URI || DEFAULT_REDIRECT_URI,
    scopes: scopes.length > 0 ? scopes : [...ALL_SCOPES],
  };
}

/** Graph API root, versioned by THREADS_GRAPH_API_VERSION */
export function resolveBaseUrl(env: Env = process.env): string {
  const version = env.THREADS_GRAPH_API_VERSION?.trim();
  return version ? `https://graph.threads.net/${version}` : DEFAULT_BASE_URL;
}

// ─── CLI config file ───

export interface ConfigFile {
  app_id?: string;
  app_secret?: string;
  redirect_uri?: string;
  scopes?: string[];
  credentials?: CredentialsJson;
}

export interface CliConfig {
  /**
   * OAuth settings, resolved on demand: only `auth` and `refresh` need the app
   * secret. Throws `ValidationError` when the app id or secret is missing.
   */
  oauth: () => OAuthConfig;
  credentials: Credentials | undefined;
}

const CONFIG_DIR = resolve(process.env.HOME ?? homedir(), ".config/threadkit");
const CONFIG_PATH = resolve(CONFIG_DIR, "config.json");

/** Get config file path */
export function getConfigPath(): string {
  return CONFIG_PATH;
}

function readConfigFile(path: string, warn: (message: string) => void): ConfigFile {
  if (!existsSync(path)) return {};

  try {
    const mode = statSync(path).mode;
    if (mode & 0o004) {
      warn(`${path} is world-readable. Run: chmod 600 ${path}`);
    }
  } catch (err) {
    warn(`Could not stat ${path}: ${(err as Error).message}`);
  }

  try {
    return JSON.parse(readFileSync(path, "utf-8")) as ConfigFile;
  } catch (err) {
    warn(`Failed to parse ${path}: ${(err as Error).message}`);
    return {};
  }
}

/**
 * Load app settings and stored credentials.
 * Priority: process.env → ~/.config/threadkit/config.json
 */
export function loadConfig(options: { path?: string; env?: Env; warn?: (message: string) => void } = {}): CliConfig {
  const env = options.env ?? process.env;
  const warn = options.warn ?? ((message: string) => console.warn(`⚠ ${message}`));
  const file = readConfigFile(options.path ?? CONFIG_PATH, warn);

  const oauth = (): OAuthConfig =>
    resolveOAuthConfig(
      {
        appId: env.THREADS_APP_ID ?? file.app_id,
        appSecret: env.THREADS_APP_SECRET ?? file.app_secret,
        redirectUri: env.THREADS_REDIRECT_URI ?? file.redirect_uri,
        scopes: env.THREADS_SCOPES ? splitList(env.THREADS_SCOPES) : file.scopes,
      },
      env,
    );

  const credentials = file.credentials ? Credentials.fromObject(file.credentials) : undefined;

  // Warn if token is expiring soon
  if (credentials) {
    const daysLeft = credentials.expiresIn() / (60 * 60 * 24);
    if (credentials.expired()) {
      warn("Access token has expired. Run 'threadkit auth' to sign in again.");
    } else if (daysLeft < 7) {
      warn(`Access token expires in ${Math.ceil(daysLeft)} day(s). Run 'threadkit refresh' to renew.`);
    }
  }

  return { oauth, credentials };
}

/** Save config to file, merged over what is already there */
export function saveConfig(config: ConfigFile, path: string = CONFIG_PATH): void {
  mkdirSync(resolve(path, ".."), { recursive: true });

  let existing: ConfigFile = {};
  if (existsSync(path)) {
    try {
      existing = JSON.parse(readFileSync(path, "utf-8")) as ConfigFile;
    } catch (err) {
      throw new ValidationError(`Refusing to overwrite unreadable ${path}: ${(err as Error).message}`);
    }
  }

  const merged = { ...existing, ...config };
  writeFileSync(path, JSON.stringify(merged, null, 2) + "\n", { mode: 0o600 });
  // Ensure permissions are correct even if file already existed
  chmodSync(path, 0o600);
}
