import type { TemperatureUnits } from '@/domain/entities';
import { DEFAULT_OPENWEATHER_BASE_URL } from '@/infrastructure';

export const DEFAULT_CITIES: readonly string[] = [
  'Philadelphia',
  'Seattle',
  'New York',
];

export const DEFAULT_UNITS: TemperatureUnits = 'imperial';

/**
 * Run configuration, read once at startup and passed to every component
 */
export interface WeatherArchiveConfig {
  apiKey: string | undefined;
  bucketName: string | undefined;
  region: string | undefined;
  cities: readonly string[];
  apiBaseUrl: string;
  units: TemperatureUnits;
  fetchTimeoutMs: number | undefined;
  sentryDsn: string | undefined;
}

function getEnvVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseCities(raw: string | undefined): readonly string[] {
  if (!raw) {
    return DEFAULT_CITIES;
  }
  const cities = raw
    .split(',')
    .map((city) => city.trim())
    .filter((city) => city.length > 0);
  return cities.length > 0 ? cities : DEFAULT_CITIES;
}

function isTemperatureUnits(value: string): value is TemperatureUnits {
  return value === 'imperial' || value === 'metric' || value === 'standard';
}

function parseUnits(raw: string | undefined): TemperatureUnits {
  if (!raw) {
    return DEFAULT_UNITS;
  }
  if (isTemperatureUnits(raw)) {
    return raw;
  }
  console.warn(
    `[Config Warning] OPENWEATHER_UNITS "${raw}" is not supported, using ${DEFAULT_UNITS}`,
  );
  return DEFAULT_UNITS;
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (!raw) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  if (Number.isFinite(parsed) && parsed > 0) {
    return parsed;
  }
  console.warn(
    `[Config Warning] FETCH_TIMEOUT_MS "${raw}" is not a positive integer, requests will not time out`,
  );
  return undefined;
}

/**
 * Load configuration from environment variables.
 *
 * Missing credentials are not an error here: they are reported with a
 * warning and surface later as authentication or parameter failures.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): WeatherArchiveConfig {
  const apiKey = getEnvVar(env, 'OPENWEATHER_API');
  const bucketName = getEnvVar(env, 'AWS_BUCKET_NAME');
  const region = getEnvVar(env, 'AWS_REGION');

  const missing = [
    !apiKey && 'OPENWEATHER_API',
    !bucketName && 'AWS_BUCKET_NAME',
    !region && 'AWS_REGION',
  ].filter(Boolean);

  for (const name of missing) {
    console.warn(`[Config Warning] ${name} is not set`);
  }

  return {
    apiKey,
    bucketName,
    region,
    cities: parseCities(getEnvVar(env, 'WEATHER_CITIES')),
    apiBaseUrl:
      getEnvVar(env, 'OPENWEATHER_BASE_URL') ?? DEFAULT_OPENWEATHER_BASE_URL,
    units: parseUnits(getEnvVar(env, 'OPENWEATHER_UNITS')),
    fetchTimeoutMs: parseTimeout(getEnvVar(env, 'FETCH_TIMEOUT_MS')),
    sentryDsn: getEnvVar(env, 'SENTRY_DSN'),
  };
}
