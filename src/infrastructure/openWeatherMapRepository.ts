import {
  isWeatherObservation,
  type TemperatureUnits,
  toError,
  WeatherFetchError,
  type WeatherObservation,
} from '@/domain/entities';
import type { WeatherRepository } from '@/domain/repositories';

export const DEFAULT_OPENWEATHER_BASE_URL =
  'http://api.openweathermap.org/data/2.5/weather';

export type FetchFunction = typeof fetch;

export interface OpenWeatherMapRepositoryOptions {
  apiKey: string | undefined;
  units: TemperatureUnits;
  baseUrl?: string;
  /** Abort the request after this many milliseconds. No timeout when unset. */
  timeoutMs?: number;
  fetch?: FetchFunction;
}

export class OpenWeatherMapRepository implements WeatherRepository {
  private readonly apiKey: string | undefined;
  private readonly units: TemperatureUnits;
  private readonly baseUrl: string;
  private readonly timeoutMs: number | undefined;
  private readonly fetchFn: FetchFunction;

  constructor(options: OpenWeatherMapRepositoryOptions) {
    this.apiKey = options.apiKey;
    this.units = options.units;
    this.baseUrl = options.baseUrl ?? DEFAULT_OPENWEATHER_BASE_URL;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  buildUrl(city: string): string {
    const params = new URLSearchParams({ q: city });
    // Without a key the API answers 401, which surfaces as a fetch error
    if (this.apiKey) {
      params.set('appid', this.apiKey);
    }
    params.set('units', this.units);
    return `${this.baseUrl}?${params.toString()}`;
  }

  async fetchCurrentWeather(city: string): Promise<WeatherObservation> {
    const url = this.buildUrl(city);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        signal:
          this.timeoutMs !== undefined
            ? AbortSignal.timeout(this.timeoutMs)
            : undefined,
      });
    } catch (error) {
      const cause = toError(error);
      throw new WeatherFetchError(
        city,
        `Request for ${city} failed: ${cause.message}`,
        undefined,
        { cause },
      );
    }

    if (!response.ok) {
      const statusText = response.statusText ? ` ${response.statusText}` : '';
      throw new WeatherFetchError(
        city,
        `HTTP ${response.status}${statusText} for ${city}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new WeatherFetchError(
        city,
        `Invalid JSON in response for ${city}`,
        response.status,
        { cause: toError(error) },
      );
    }

    if (!isWeatherObservation(body)) {
      throw new WeatherFetchError(
        city,
        `Unexpected response body for ${city}: expected a JSON object`,
        response.status,
      );
    }

    return body;
  }
}
