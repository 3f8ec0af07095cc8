import { log } from "./logger/log.js";
import { config as loadDotenv } from "dotenv";
import { existsSync, readFileSync } from "fs";
import { load as loadYaml } from "js-yaml";
import { homedir } from "os";
import { join, extname } from "path";
import { z } from "zod";

// ---------------------------------------------------------------------------
// User-wide environment config (~/.anchor-patch.env)
// ---------------------------------------------------------------------------

// dotenv never overrides variables that are already set, so explicit
// environment variables win over the user-wide file.
// Skipped under Vitest so tests that mock `fs` see a clean environment.
const USER_WIDE_CONFIG_PATH = join(homedir(), ".anchor-patch.env");

const isVitest =
  typeof (globalThis as { vitest?: unknown }).vitest !== "undefined";

if (!isVitest) {
  loadDotenv({ path: USER_WIDE_CONFIG_PATH });
}

export const DEFAULT_PREVIEW_CONTEXT = 3;

export const CONFIG_DIR = join(homedir(), ".anchor-patch");
export const CONFIG_JSON_FILEPATH = join(CONFIG_DIR, "config.json");
export const CONFIG_YAML_FILEPATH = join(CONFIG_DIR, "config.yaml");
export const CONFIG_YML_FILEPATH = join(CONFIG_DIR, "config.yml");
export const CONFIG_FILEPATH = CONFIG_JSON_FILEPATH;

// Represents config as persisted in config.json.
export type StoredConfig = {
  /** Reject patches whose context matches needed more fuzz than this. */
  maxFuzz?: number;
  /** Context lines around each change in `--preview` output. */
  previewContext?: number;
  color?: boolean;
};

// Represents full runtime config.
export type AppConfig = {
  maxFuzz?: number;
  previewContext: number;
  color: boolean;
};

// A fuzz limit is a whole number; YAML and env values may carry it as a
// string of digits.
const MaxFuzzSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .trim()
    .regex(/^\d+$/)
    .transform((value) => Number(value)),
]);

// Fields with the wrong type are dropped rather than failing the whole file.
const StoredConfigSchema = z.object({
  maxFuzz: z.unknown(),
  previewContext: z.number().int().nonnegative().optional().catch(undefined),
  color: z.boolean().optional().catch(undefined),
});

function parseStoredConfig(raw: string, ext: string): StoredConfig {
  const parsed: unknown =
    ext === ".yaml" || ext === ".yml" ? loadYaml(raw) : JSON.parse(raw);
  const result = StoredConfigSchema.safeParse(parsed);
  if (!result.success) {
    return {};
  }
  const { maxFuzz, previewContext, color } = result.data;
  const stored: StoredConfig = { previewContext, color };

  if (maxFuzz != null) {
    const fuzz = MaxFuzzSchema.safeParse(maxFuzz);
    if (fuzz.success) {
      stored.maxFuzz = fuzz.data;
    } else {
      log(
        `[anchor-patch] Warning: 'maxFuzz' in config is not a whole number (got '${String(maxFuzz)}'). Ignoring this value.`,
      );
    }
  }
  return stored;
}

function maxFuzzFromEnv(): number | undefined {
  const raw = process.env["ANCHOR_PATCH_MAX_FUZZ"];
  if (!raw) {
    return undefined;
  }
  const fuzz = MaxFuzzSchema.safeParse(raw);
  if (!fuzz.success) {
    log(
      `[anchor-patch] Warning: ANCHOR_PATCH_MAX_FUZZ is not a whole number (got '${raw}'). Ignoring it.`,
    );
    return undefined;
  }
  return fuzz.data;
}

export const loadConfig = (
  configPath: string | undefined = CONFIG_FILEPATH,
): AppConfig => {
  // Fall back to the YAML variants when the default JSON file is missing.
  let actualConfigPath = configPath;
  if (!existsSync(actualConfigPath) && configPath === CONFIG_FILEPATH) {
    if (existsSync(CONFIG_YAML_FILEPATH)) {
      actualConfigPath = CONFIG_YAML_FILEPATH;
    } else if (existsSync(CONFIG_YML_FILEPATH)) {
      actualConfigPath = CONFIG_YML_FILEPATH;
    }
  }

  let storedConfig: StoredConfig = {};
  if (existsSync(actualConfigPath)) {
    const raw = readFileSync(actualConfigPath, "utf-8");
    const ext = extname(actualConfigPath).toLowerCase();
    try {
      storedConfig = parseStoredConfig(raw, ext);
    } catch (err) {
      log(
        `[anchor-patch] Could not parse ${actualConfigPath}, using defaults: ${String(err)}`,
      );
      storedConfig = {};
    }
  }

  return {
    maxFuzz: maxFuzzFromEnv() ?? storedConfig.maxFuzz,
    previewContext: storedConfig.previewContext ?? DEFAULT_PREVIEW_CONTEXT,
    color: storedConfig.color ?? true,
  };
};
