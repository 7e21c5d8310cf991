import fs from "node:fs";
import { readFile, rename, stat, writeFile, mkdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import type { Logger } from "./logger.js";
import { ConfigError } from "./utils/errors.js";

export const CONFIG_FILE_NAME = ".caseport.yaml";
export const DEFAULT_PROFILE = "default";
export const DEFAULT_TIMEOUT_SECONDS = 30;

const ProfileSchema = z
  .object({
    url: z.string().url().optional(),
    email: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    timeout: z.number().int().positive().optional(),
    historyFile: z.string().min(1).optional(),
  })
  .strict();

const ConfigFileSchema = z.object({
  defaultProfile: z.string().min(1).optional(),
  profiles: z.record(ProfileSchema).default({}),
});

export type Profile = z.infer<typeof ProfileSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type Overrides = {
  url?: string;
  email?: string;
  password?: string;
  timeout?: number;
  historyFile?: string;
};

export type Settings = {
  profile: string;
  configPath: string | null;
  url?: string;
  email?: string;
  password?: string;
  timeout: number;
  historyFile: string;
};

export type Connection = {
  url: string;
  email: string;
  password: string;
  timeoutSeconds: number;
};

type Environment = Record<string, string | undefined>;

type Locations = {
  cwd?: string;
  home?: string;
};

function expandHome(filePath: string, home: string): string {
  if (filePath === "~") return home;
  if (filePath.startsWith("~/")) return path.join(home, filePath.slice(2));
  return filePath;
}

function nonBlank(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

/** `--config` wins; otherwise the working directory, then the home directory. */
export function findConfigFile(explicitPath?: string, locations: Locations = {}): string | null {
  const cwd = locations.cwd ?? process.cwd();
  const home = locations.home ?? os.homedir();

  if (explicitPath) {
    const resolved = path.resolve(cwd, expandHome(explicitPath, home));
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    return resolved;
  }

  for (const candidate of [path.join(cwd, CONFIG_FILE_NAME), path.join(home, CONFIG_FILE_NAME)]) {
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read config file ${filePath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${filePath}: ${message}`);
  }

  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length ? `${issue.path.join(".")}: ` : "";
    throw new ConfigError(`Invalid config file ${filePath}: ${where}${issue.message}`);
  }
  return result.data;
}

async function warnIfReadableByOthers(filePath: string, logger?: Logger): Promise<void> {
  if (process.platform === "win32" || !logger) return;
  const info = await stat(filePath);
  if (info.mode & 0o077) {
    logger.warn("config file is readable by other users; run chmod 600 on it", { path: filePath });
  }
}

/**
 * Merges flags, environment, the selected profile and defaults, in that order
 * of precedence. Credentials may stay unset here; `requireConnection` checks
 * them for commands that talk to the server.
 */
export async function resolveSettings(options: {
  configPath?: string;
  profile?: string;
  overrides?: Overrides;
  env?: Environment;
  locations?: Locations;
  logger?: Logger;
}): Promise<Settings> {
  const env = options.env ?? process.env;
  const home = options.locations?.home ?? os.homedir();
  const overrides = options.overrides ?? {};

  const configPath = findConfigFile(options.configPath, options.locations);
  const file: ConfigFile = configPath ? await loadConfigFile(configPath) : { profiles: {} };
  if (configPath) {
    await warnIfReadableByOthers(configPath, options.logger);
  }

  const profileName = options.profile ?? file.defaultProfile ?? DEFAULT_PROFILE;
  const profile = file.profiles[profileName];
  if (!profile && options.profile) {
    throw new ConfigError(`Profile not found: ${profileName}`);
  }

  return {
    profile: profileName,
    configPath,
    url: nonBlank(overrides.url) ?? nonBlank(env.TESTRAIL_URL) ?? profile?.url,
    email: nonBlank(overrides.email) ?? nonBlank(env.TESTRAIL_EMAIL) ?? profile?.email,
    password: nonBlank(overrides.password) ?? nonBlank(env.TESTRAIL_PASSWORD) ?? profile?.password,
    timeout: overrides.timeout ?? profile?.timeout ?? DEFAULT_TIMEOUT_SECONDS,
    historyFile: expandHome(
      overrides.historyFile ?? profile?.historyFile ?? path.join(home, ".caseport", "history.sqlite"),
      home,
    ),
  };
}

export function requireConnection(settings: Settings): Connection {
  const missing = (label: string, flag: string, envName: string): ConfigError =>
    new ConfigError(
      `Missing ${label}: pass --${flag}, set ${envName} or add '${flag}' to profile '${settings.profile}' in ${CONFIG_FILE_NAME}`,
    );

  if (!settings.url) throw missing("server URL", "url", "TESTRAIL_URL");
  if (!settings.email) throw missing("email", "email", "TESTRAIL_EMAIL");
  if (!settings.password) throw missing("password or API key", "password", "TESTRAIL_PASSWORD");

  return {
    url: settings.url,
    email: settings.email,
    password: settings.password,
    timeoutSeconds: settings.timeout,
  };
}

/** Writes one profile into the config file, keeping the others. The file ends up with mode 0600. */
export async function initConfig(filePath: string, profileName: string, profile: Profile): Promise<void> {
  const validated = ProfileSchema.safeParse(profile);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    throw new ConfigError(`Invalid profile '${profileName}': ${issue.path.join(".")} ${issue.message}`);
  }

  const existing: ConfigFile = fs.existsSync(filePath) ? await loadConfigFile(filePath) : { profiles: {} };
  const next: ConfigFile = {
    ...existing,
    profiles: { ...existing.profiles, [profileName]: validated.data },
  };

  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tempPath, stringifyYaml(next), { encoding: "utf8", mode: 0o600 });
  await rename(tempPath, filePath);
}

export function redactSettings(settings: Settings): Record<string, string | number | null> {
  return {
    profile: settings.profile,
    configPath: settings.configPath,
    url: settings.url ?? null,
    email: settings.email ?? null,
    password: settings.password ? "********" : null,
    timeout: settings.timeout,
    historyFile: settings.historyFile,
  };
}
