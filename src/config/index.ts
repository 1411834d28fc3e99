import "dotenv/config";
import { ConfigError } from "../suite/errors.js";
import type { SuiteConfig } from "./types.js";

export const DEFAULT_BASE_URL = "https://restful-booker.herokuapp.com";
export const DEFAULT_TIMEOUT_MS = 5000;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SuiteConfig {
  return {
    baseUrl: normalizeBaseUrl(env.BOOKING_API_URL || DEFAULT_BASE_URL),
    credentials: {
      username: env.BOOKING_API_USERNAME || "admin",
      password: env.BOOKING_API_PASSWORD || "password123",
    },
    timeoutMs: parseTimeout(env.REQUEST_TIMEOUT_MS),
    reportDir: env.REPORT_DIR || "./reports",
    saveReport: env.SAVE_REPORT !== "false",
  };
}

/**
 * Validates an http(s) URL and strips trailing slashes so endpoint paths can
 * be appended directly.
 */
export function normalizeBaseUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`Invalid base URL: "${raw}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`Base URL must use http or https: "${raw}"`);
  }
  return raw.replace(/\/+$/, "");
}

function parseTimeout(raw: string | undefined): number {
  if (!raw) return DEFAULT_TIMEOUT_MS;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`REQUEST_TIMEOUT_MS must be a positive integer, got "${raw}"`);
  }
  return value;
}

export type { SuiteConfig, Credentials } from "./types.js";
