import {
  type ArchiveError,
  type BucketEnsureError,
  extractObservationSummary,
  type ObservationSummary,
  type Result,
  type TemperatureUnits,
  type WeatherFetchError,
} from '@/domain/entities';
import type {
  ArchiveObservationUseCase,
  ArchiveReceipt,
} from './archiveObservationUseCase';
import type { BucketStatus, EnsureBucketUseCase } from './ensureBucketUseCase';
import type { FetchWeatherUseCase } from './fetchWeatherUseCase';

/**
 * Receives progress of a run, one call per state change of a city
 */
export interface RunReporter {
  bucketUnavailable(error: BucketEnsureError): void;
  fetching(city: string): void;
  fetchFailed(city: string, error: WeatherFetchError): void;
  observed(
    city: string,
    summary: ObservationSummary,
    units: TemperatureUnits,
  ): void;
  archived(city: string, receipt: ArchiveReceipt): void;
  archiveFailed(city: string, error: ArchiveError): void;
}

export type CityOutcome =
  | { city: string; status: 'fetch-failed'; error: WeatherFetchError }
  | {
      city: string;
      status: 'archived';
      summary: ObservationSummary;
      receipt: ArchiveReceipt;
    }
  | {
      city: string;
      status: 'archive-failed';
      summary: ObservationSummary;
      error: ArchiveError;
    };

export interface RunWeatherArchiveUseCaseDeps {
  cities: readonly string[];
  units: TemperatureUnits;
  ensureBucket: EnsureBucketUseCase;
  fetchWeather: FetchWeatherUseCase;
  archiveObservation: ArchiveObservationUseCase;
  reporter: RunReporter;
}

export interface RunWeatherArchiveOutput {
  bucket: Result<BucketStatus, BucketEnsureError>;
  outcomes: CityOutcome[];
}

/**
 * Use case for one archive run over the configured cities.
 * Flow: Ensure bucket → for each city in order: Fetch → Report → Archive → Report
 *
 * Cities are processed one after another. A response without the expected
 * fields throws MalformedObservationError and ends the run.
 */
export class RunWeatherArchiveUseCase {
  private readonly deps: RunWeatherArchiveUseCaseDeps;

  constructor(deps: RunWeatherArchiveUseCaseDeps) {
    this.deps = deps;
  }

  async execute(): Promise<RunWeatherArchiveOutput> {
    const { reporter } = this.deps;

    const bucket = await this.deps.ensureBucket.execute();
    if (!bucket.ok) {
      reporter.bucketUnavailable(bucket.error);
    }

    const outcomes: CityOutcome[] = [];
    for (const city of this.deps.cities) {
      outcomes.push(await this.processCity(city));
    }

    return { bucket, outcomes };
  }

  private async processCity(city: string): Promise<CityOutcome> {
    const { reporter } = this.deps;

    reporter.fetching(city);
    const fetched = await this.deps.fetchWeather.execute(city);
    if (!fetched.ok) {
      reporter.fetchFailed(city, fetched.error);
      return { city, status: 'fetch-failed', error: fetched.error };
    }

    const summary = extractObservationSummary(fetched.value, city);
    reporter.observed(city, summary, this.deps.units);

    const archived = await this.deps.archiveObservation.execute(
      fetched.value,
      city,
    );
    if (!archived.ok) {
      reporter.archiveFailed(city, archived.error);
      return { city, status: 'archive-failed', summary, error: archived.error };
    }

    reporter.archived(city, archived.value);
    return { city, status: 'archived', summary, receipt: archived.value };
  }
}
