export type ServiceConfig = Readonly<{
  servingEndpointUrl: string | null;
  servingToken: string | null;
  requestTimeoutMs: number;
  maxTokens: number;
  temperature: number;
  port: number;
  host: string;
  version: string;
}>;

type EnvSource = Record<string, string | undefined>;

export const SERVICE_VERSION = "1.0.0";

const defaultRequestTimeoutMs = 30000;
const defaultPort = 8000;
const defaultHost = "0.0.0.0";

function readTrimmedEnvVar(env: EnvSource, name: string): string | null {
  const value = env[name];
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readPositiveNumber(
  env: EnvSource,
  name: string,
  fallback: number,
): number {
  const value = Number(readTrimmedEnvVar(env, name) ?? Number.NaN);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Read process configuration once at startup. A missing serving token or
 * endpoint URL does not stop the server; requests report it instead.
 */
export function loadServiceConfig(env: EnvSource = process.env): ServiceConfig {
  return Object.freeze({
    servingEndpointUrl: readTrimmedEnvVar(env, "DATABRICKS_ENDPOINT_URL"),
    servingToken: readTrimmedEnvVar(env, "DATABRICKS_API_TOKEN"),
    requestTimeoutMs: readPositiveNumber(
      env,
      "REQUEST_TIMEOUT_MS",
      defaultRequestTimeoutMs,
    ),
    maxTokens: 1000,
    temperature: 0.7,
    port: readPositiveNumber(env, "PORT", defaultPort),
    host: readTrimmedEnvVar(env, "HOST") ?? defaultHost,
    version: SERVICE_VERSION,
  });
}
