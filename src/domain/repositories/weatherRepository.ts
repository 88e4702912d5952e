import type { WeatherObservation } from '../entities/weatherObservation';

/**
 * Repository interface for current-weather lookups.
 * Implementations can be OpenWeatherMap or any other provider returning JSON.
 */
export interface WeatherRepository {
  /**
   * Fetch the current observation for a city.
   * @param city - City name as understood by the provider (e.g., "New York")
   * @returns The raw provider response
   * @throws {WeatherFetchError} On transport failure, non-2xx status or a body that is not a JSON object
   */
  fetchCurrentWeather(city: string): Promise<WeatherObservation>;
}
