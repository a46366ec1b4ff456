/**
 * Shell configuration: command-line flags, then environment, then defaults
 */

import { config as loadDotenv } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { DEFAULT_MAX_LENGTH } from "@pixel-banner/core";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const ENV_MAX_LENGTH = "PIXEL_BANNER_MAX_LENGTH";
export const ENV_LOSSY = "PIXEL_BANNER_LOSSY";

export interface ShellConfig {
  maxLength: number;
  lossy: boolean;
}

/** Values given on the command line */
export interface ConfigFlags {
  maxLength?: number;
  lossy?: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Load .env.local from the repo root, if present
 */
export function loadEnvFile(): void {
  loadDotenv({ path: resolve(__dirname, "../../../.env.local") });
}

/**
 * Parse a maximum length; null when not a positive integer
 */
export function parseMaxLength(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) return null;
  const num = parseInt(value, 10);
  return Number.isSafeInteger(num) && num >= 1 ? num : null;
}

const TRUE_VALUES = ["1", "true", "yes", "on"];
const FALSE_VALUES = ["0", "false", "no", "off", ""];

/**
 * Parse a boolean flag; null when unrecognised
 */
export function parseFlag(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  return null;
}

/**
 * Read configuration from environment variables
 */
export function loadConfig(env: Env = process.env): ShellConfig {
  const config: ShellConfig = { maxLength: DEFAULT_MAX_LENGTH, lossy: false };

  const maxLength = env[ENV_MAX_LENGTH];
  if (maxLength !== undefined && maxLength !== "") {
    const parsed = parseMaxLength(maxLength);
    if (parsed === null) {
      console.warn(
        `Ignoring ${ENV_MAX_LENGTH}="${maxLength}": expected a positive integer, using ${DEFAULT_MAX_LENGTH}`
      );
    } else {
      config.maxLength = parsed;
    }
  }

  const lossy = env[ENV_LOSSY];
  if (lossy !== undefined) {
    const parsed = parseFlag(lossy);
    if (parsed === null) {
      console.warn(`Ignoring ${ENV_LOSSY}="${lossy}": expected true or false, using false`);
    } else {
      config.lossy = parsed;
    }
  }

  return config;
}

/**
 * Apply command-line flags over the environment configuration
 */
export function resolveConfig(flags: ConfigFlags, env: Env = process.env): ShellConfig {
  const base = loadConfig(env);
  return {
    maxLength: flags.maxLength ?? base.maxLength,
    lossy: flags.lossy || base.lossy,
  };
}
