import {
  err,
  ok,
  type Result,
  toError,
  WeatherFetchError,
  type WeatherObservation,
} from '@/domain/entities';
import type { WeatherRepository } from '@/domain/repositories';

export interface FetchWeatherUseCaseDeps {
  weatherRepository: WeatherRepository;
}

export class FetchWeatherUseCase {
  private readonly weatherRepository: WeatherRepository;

  constructor(deps: FetchWeatherUseCaseDeps) {
    this.weatherRepository = deps.weatherRepository;
  }

  async execute(
    city: string,
  ): Promise<Result<WeatherObservation, WeatherFetchError>> {
    try {
      const observation = await this.weatherRepository.fetchCurrentWeather(city);
      return ok(observation);
    } catch (error) {
      const fetchError =
        error instanceof WeatherFetchError
          ? error
          : new WeatherFetchError(city, toError(error).message, undefined, {
              cause: error,
            });
      console.error(`Error fetching weather data: ${fetchError.message}`);
      return err(fetchError);
    }
  }
}
