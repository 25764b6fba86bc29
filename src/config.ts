import path from "node:path";
import dotenv from "dotenv";
import { ConfigurationError } from "./services/workflow/errors";

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  llmApiKey: string;
  llmBaseUrl: string;
  llmModel: string;
  llmMaxOutputTokens: number;
  apifyApiToken: string;
  apifyBaseUrl: string;
  linkedinLimitPerSource: number;
  xMaxItems: number;
  reportsDir: string;
  remoteTimeoutMs: number;
  maxUploadBytes: number;
}

export const LLM_KEY_PLACEHOLDER = "your_openai_api_key_here";
export const APIFY_TOKEN_PLACEHOLDER = "your_apify_api_token_here";

let envLoaded = false;

/**
 * Loads `.env` from the working directory once. Values already present in
 * `process.env` win, so deployments can override the file.
 */
export function loadEnv(envPath = path.resolve(process.cwd(), ".env")): void {
  if (envLoaded) {
    return;
  }

  envLoaded = true;
  dotenv.config({ path: envPath, override: false });
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function stringFromEnv(names: string[], fallback: string): string {
  for (const name of names) {
    const value = process.env[name]?.trim();
    if (value) {
      return value;
    }
  }

  return fallback;
}

export function getConfig(): AppConfig {
  return {
    port: intFromEnv("PORT", 5000),
    host: stringFromEnv(["HOST"], "0.0.0.0"),
    logLevel: stringFromEnv(["LOG_LEVEL"], "info"),
    llmApiKey: stringFromEnv(["LLM_API_KEY", "OPENAI_API_KEY"], ""),
    llmBaseUrl: stringFromEnv(["LLM_BASE_URL"], "https://api.openai.com/v1"),
    llmModel: stringFromEnv(["LLM_MODEL", "OPENAI_MODEL"], "gpt-4o"),
    llmMaxOutputTokens: intFromEnv("LLM_MAX_OUTPUT_TOKENS", 2000),
    apifyApiToken: stringFromEnv(["APIFY_API_TOKEN"], ""),
    apifyBaseUrl: stringFromEnv(["APIFY_BASE_URL"], "https://api.apify.com/v2"),
    linkedinLimitPerSource: intFromEnv("LINKEDIN_LIMIT_PER_SOURCE", 5),
    xMaxItems: intFromEnv("X_MAX_ITEMS", 20),
    reportsDir: stringFromEnv(["REPORTS_DIR"], "reports"),
    remoteTimeoutMs: intFromEnv("REMOTE_TIMEOUT_MS", 120000),
    maxUploadBytes: intFromEnv("MAX_UPLOAD_BYTES", 16 * 1024 * 1024),
  };
}

export type CredentialState = "missing" | "placeholder" | "configured";

export function credentialState(value: string, placeholder: string): CredentialState {
  const trimmed = value.trim();
  if (!trimmed) {
    return "missing";
  }

  return trimmed === placeholder ? "placeholder" : "configured";
}

export function isLlmConfigured(config: AppConfig): boolean {
  return credentialState(config.llmApiKey, LLM_KEY_PLACEHOLDER) === "configured";
}

export function isApifyConfigured(config: AppConfig): boolean {
  return credentialState(config.apifyApiToken, APIFY_TOKEN_PLACEHOLDER) === "configured";
}

export function assertCredentialsConfigured(
  config: AppConfig,
  required: { llm?: boolean; apify?: boolean } = { llm: true, apify: true },
): void {
  const missing: string[] = [];

  if (required.llm && !isLlmConfigured(config)) {
    missing.push("LLM_API_KEY");
  }

  if (required.apify && !isApifyConfigured(config)) {
    missing.push("APIFY_API_TOKEN");
  }

  if (missing.length > 0) {
    throw new ConfigurationError(`${missing.join(", ")} not configured`);
  }
}
