import type { S3Client } from '@aws-sdk/client-s3';
import {
  ArchiveObservationUseCase,
  EnsureBucketUseCase,
  FetchWeatherUseCase,
  RunWeatherArchiveUseCase,
} from '@/application';
import { loadConfig } from '@/config';
import { toError } from '@/domain/entities';
import {
  type FetchFunction,
  OpenWeatherMapRepository,
  S3ArchiveRepository,
} from '@/infrastructure';
import { initMonitoring } from '@/monitoring/sentry';
import { createConsoleReporter } from '@/presentation';

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  s3Client?: S3Client;
  fetch?: FetchFunction;
  clock?: () => Date;
}

/**
 * Run one archive pass over the configured cities.
 *
 * Resolves to the process exit code: 0 once every city has been attempted,
 * even if some failed, and 1 when the run was aborted by an unexpected error.
 */
export async function main(options: MainOptions = {}): Promise<number> {
  const config = loadConfig(options.env);
  const monitoring = initMonitoring(config.sentryDsn);

  const archiveRepository = new S3ArchiveRepository(
    config.bucketName,
    config.region,
    options.s3Client,
  );
  const weatherRepository = new OpenWeatherMapRepository({
    apiKey: config.apiKey,
    units: config.units,
    baseUrl: config.apiBaseUrl,
    timeoutMs: config.fetchTimeoutMs,
    fetch: options.fetch,
  });

  const useCase = new RunWeatherArchiveUseCase({
    cities: config.cities,
    units: config.units,
    ensureBucket: new EnsureBucketUseCase({ archiveRepository }),
    fetchWeather: new FetchWeatherUseCase({ weatherRepository }),
    archiveObservation: new ArchiveObservationUseCase({
      archiveRepository,
      clock: options.clock,
    }),
    reporter: createConsoleReporter(),
  });

  try {
    await useCase.execute();
    return 0;
  } catch (error) {
    const err = toError(error);
    console.error(`[Fatal] Weather archive run aborted: ${err.message}`, {
      error: err.name,
      stack: err.stack,
    });
    await monitoring.captureRunFailure(err, { bucket: config.bucketName });
    return 1;
  }
}
