import { ConfigurationError } from "./errors";
import { createKmsDecrypter, type SecretDecrypter } from "./secrets";
import type { S3StoreConfig } from "./storage";

export type Env = Record<string, string | undefined>;

// Scheduler and server settings, read once at module load
export const schedule = {
  cron: process.env.NOTIFIER_CRON || "0 9 1 * *",
  port: parseInt(process.env.PORT || "3000", 10),
};

/**
 * Variables that deployments may store as KMS ciphertexts.
 * Everything else is always plaintext.
 */
export const SECRET_VARIABLES = [
  "AS_BASEURL",
  "AS_USERNAME",
  "AS_PASSWORD",
  "CARTOGRAPHER_BASEURL",
  "TEAMS_URL",
  "BUCKET_NAME",
  "ACCESS_KEY_ID",
  "SECRET_ACCESS_KEY",
] as const;

export const DEFAULT_DISCOVERY_BASE_URL = "https://dimes.rockarch.org";

export type NotifierConfig = {
  archivesSpace: { baseUrl: string; username: string; password: string };
  cartographer: { baseUrl: string };
  storage: S3StoreConfig;
  webhookUrl: string;
  discoveryBaseUrl: string;
  httpTimeoutMs: number;
  dryRun: boolean;
};

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) throw new ConfigurationError(`${name} is not configured`);
  return value;
}

function optional(env: Env, name: string): string | undefined {
  return env[name]?.trim() || undefined;
}

/**
 * Build the run configuration from plaintext variables.
 */
export function loadConfig(env: Env): NotifierConfig {
  const timeoutSeconds = parseInt(env.HTTP_TIMEOUT_SECONDS || "30", 10);
  if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
    throw new ConfigurationError(`HTTP_TIMEOUT_SECONDS must be a positive integer, got "${env.HTTP_TIMEOUT_SECONDS}"`);
  }

  return {
    archivesSpace: {
      baseUrl: required(env, "AS_BASEURL"),
      username: required(env, "AS_USERNAME"),
      password: required(env, "AS_PASSWORD"),
    },
    cartographer: { baseUrl: required(env, "CARTOGRAPHER_BASEURL") },
    storage: {
      bucket: required(env, "BUCKET_NAME"),
      region: optional(env, "AWS_REGION") ?? "us-east-1",
      endpoint: optional(env, "S3_ENDPOINT"),
      accessKeyId: optional(env, "ACCESS_KEY_ID"),
      secretAccessKey: optional(env, "SECRET_ACCESS_KEY"),
    },
    webhookUrl: required(env, "TEAMS_URL"),
    discoveryBaseUrl: optional(env, "DISCOVERY_BASE_URL") ?? DEFAULT_DISCOVERY_BASE_URL,
    httpTimeoutMs: timeoutSeconds * 1000,
    dryRun: isTruthy(env.NOTIFIER_DRY_RUN),
  };
}

/**
 * Resolve secrets once, before the pipeline runs. With ENV_ENCRYPTED set,
 * each secret variable that is present is decrypted exactly once; nothing
 * downstream ever sees a ciphertext.
 */
export async function resolveConfig(env: Env = process.env, decrypt?: SecretDecrypter): Promise<NotifierConfig> {
  if (!isTruthy(env.ENV_ENCRYPTED)) return loadConfig(env);

  const decrypter =
    decrypt ?? createKmsDecrypter(optional(env, "AWS_REGION") ?? "us-east-1", optional(env, "AWS_LAMBDA_FUNCTION_NAME"));

  const plain: Env = { ...env };
  for (const name of SECRET_VARIABLES) {
    const ciphertext = optional(env, name);
    if (ciphertext) plain[name] = await decrypter(ciphertext);
  }
  return loadConfig(plain);
}
