import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { AlreadyInitializedError, ConfigError } from "./errors.js";

export interface ScanConfig {
  /** Canonical absolute path of the tree being scanned. */
  projectRoot: string;
  include: string[];
  /** Import prefix -> directory relative to the project root. */
  aliases: Record<string, string>;
  excludeDirs: string[];
  excludeFileSuffixes: string[];
  ignorePatterns: string[];
}

export const CONFIG_FILE_NAME = "export-audit.json";
const SCHEMA_VERSION = 1;

const DEFAULT_INCLUDE = ["apps/web", "apps/mobile", "libs"];

const DEFAULT_ALIASES: Record<string, string> = {
  "@shared/": "libs/shared/src/lib",
};

const DEFAULT_EXCLUDE_DIRS = [
  "mocks",
  "__mocks__",
  "mocks_stubs",
  "tests",
  "environments",
  "i18n",
];

const DEFAULT_EXCLUDE_FILE_SUFFIXES = [
  ".spec.ts",
  ".d.ts",
  ".stories.ts",
  "-stub.ts",
  "mocks.ts",
  "mock.ts",
];

const DEFAULT_IGNORE_PATTERNS = ["node_modules"];

const configFileSchema = z
  .object({
    version: z.literal(SCHEMA_VERSION).default(SCHEMA_VERSION),
    include: z.array(z.string().min(1)).default(DEFAULT_INCLUDE),
    aliases: z.record(z.string().min(1)).default(DEFAULT_ALIASES),
    excludeDirs: z.array(z.string().min(1)).default(DEFAULT_EXCLUDE_DIRS),
    excludeFileSuffixes: z
      .array(z.string().min(1))
      .default(DEFAULT_EXCLUDE_FILE_SUFFIXES),
    ignorePatterns: z.array(z.string()).default([]),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function getConfigPath(projectRoot: string): string {
  return path.join(projectRoot, CONFIG_FILE_NAME);
}

export function defaultConfig(projectRoot: string): ScanConfig {
  return toScanConfig(projectRoot, configFileSchema.parse({}));
}

/**
 * Load the scan configuration for a tree. The config file is optional;
 * every field falls back to its default.
 */
export function loadConfig(projectRoot: string): ScanConfig {
  const root = fs.realpathSync(path.resolve(projectRoot));
  const configPath = getConfigPath(root);

  if (!fs.existsSync(configPath)) {
    return defaultConfig(root);
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      configPath,
      err instanceof Error ? err.message : String(err),
    );
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(configPath, detail);
  }

  return toScanConfig(root, parsed.data);
}

export interface InitOptions {
  force?: boolean;
}

export function initConfig(
  projectRoot: string,
  options: InitOptions = {},
): string {
  const configPath = getConfigPath(path.resolve(projectRoot));

  if (fs.existsSync(configPath) && !options.force) {
    throw new AlreadyInitializedError(configPath);
  }

  const file: ConfigFile = configFileSchema.parse({});
  fs.writeFileSync(configPath, JSON.stringify(file, null, 2) + "\n", "utf-8");
  return configPath;
}

function toScanConfig(projectRoot: string, file: ConfigFile): ScanConfig {
  return {
    projectRoot,
    include: file.include,
    aliases: file.aliases,
    excludeDirs: file.excludeDirs,
    excludeFileSuffixes: file.excludeFileSuffixes,
    ignorePatterns: [...DEFAULT_IGNORE_PATTERNS, ...file.ignorePatterns],
  };
}
