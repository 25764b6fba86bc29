import fs from "node:fs";
import path from "node:path";
import {
  APIFY_TOKEN_PLACEHOLDER,
  credentialState,
  getConfig,
  LLM_KEY_PLACEHOLDER,
  loadEnv,
  type CredentialState,
} from "../src/config";

const MIN_NODE_MAJOR = 20;

function describeCredential(name: string, state: CredentialState): string {
  switch (state) {
    case "configured":
      return `[ok] ${name} is configured`;
    case "placeholder":
      return `[!!] ${name} still holds the placeholder from .env.example`;
    case "missing":
      return `[!!] ${name} is not set`;
  }
}

function main(): number {
  let failures = 0;

  const nodeMajor = Number.parseInt(process.versions.node.split(".")[0] ?? "0", 10);
  if (nodeMajor >= MIN_NODE_MAJOR) {
    console.log(`[ok] Node.js ${process.versions.node}`);
  } else {
    console.log(`[!!] Node.js ${process.versions.node} is older than ${MIN_NODE_MAJOR}`);
    failures += 1;
  }

  const envPath = path.resolve(process.cwd(), ".env");
  if (fs.existsSync(envPath)) {
    console.log(`[ok] Found ${envPath}`);
  } else {
    console.log("[..] No .env file; copy .env.example to .env or export the variables");
  }

  loadEnv(envPath);
  const config = getConfig();

  const llmState = credentialState(config.llmApiKey, LLM_KEY_PLACEHOLDER);
  console.log(describeCredential("LLM_API_KEY", llmState));
  if (llmState !== "configured") {
    failures += 1;
  }

  const apifyState = credentialState(config.apifyApiToken, APIFY_TOKEN_PLACEHOLDER);
  console.log(describeCredential("APIFY_API_TOKEN", apifyState));
  if (apifyState !== "configured") {
    failures += 1;
  }

  console.log(`[..] Model: ${config.llmModel} via ${config.llmBaseUrl}`);
  console.log(`[..] Reports directory: ${path.resolve(config.reportsDir)}`);

  if (failures > 0) {
    console.log(`[verify-setup] ${failures} problem(s) found`);
    return 1;
  }

  console.log("[verify-setup] Setup looks good");
  return 0;
}

process.exitCode = main();
