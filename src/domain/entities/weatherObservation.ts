import { MalformedObservationError } from './errors';

/**
 * Raw current-weather response as returned by the API.
 * Only the members read by the report are named; everything else is kept as is.
 */
export interface WeatherObservation {
  [field: string]: unknown;
  main?: unknown;
  weather?: unknown;
}

export type ArchivedObservation = WeatherObservation & { timestamp: string };

export interface ObservationSummary {
  temperature: number;
  feelsLike: number;
  humidity: number;
  description: string;
}

export type TemperatureUnits = 'imperial' | 'metric' | 'standard';

export function isWeatherObservation(
  value: unknown,
): value is WeatherObservation {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(
  source: WeatherObservation,
  field: string,
  city: string,
): number {
  const value = source[field];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new MalformedObservationError(city, `main.${field}`);
  }
  return value;
}

/**
 * Pull the reported fields out of an observation.
 * @throws {MalformedObservationError} when the response does not have the expected shape
 */
export function extractObservationSummary(
  observation: WeatherObservation,
  city: string,
): ObservationSummary {
  const { main, weather } = observation;
  if (!isWeatherObservation(main)) {
    throw new MalformedObservationError(city, 'main');
  }

  const first: unknown = Array.isArray(weather) ? weather[0] : undefined;
  const description = isWeatherObservation(first)
    ? first.description
    : undefined;
  if (typeof description !== 'string') {
    throw new MalformedObservationError(city, 'weather[0].description');
  }

  return {
    temperature: readNumber(main, 'temp', city),
    feelsLike: readNumber(main, 'feels_like', city),
    humidity: readNumber(main, 'humidity', city),
    description,
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a local time as YYYYMMDD-HHMMSS
 */
export function formatArchiveTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

export const ARCHIVE_KEY_PREFIX = 'weather-data';

export function buildArchiveKey(city: string, timestamp: string): string {
  return `${ARCHIVE_KEY_PREFIX}/${city}-${timestamp}.json`;
}

export function stampObservation(
  observation: WeatherObservation,
  timestamp: string,
): ArchivedObservation {
  return { ...observation, timestamp };
}
