import type { RunReporter } from '@/application';
import { formatObservationLines } from './observationFormatter';

/**
 * Create a reporter that prints run progress to stdout.
 * Failures are printed as report lines; the use cases log the underlying errors.
 */
export function createConsoleReporter(): RunReporter {
  return {
    bucketUnavailable(error) {
      console.warn(
        `[Bucket Warning] Continuing without a confirmed bucket: ${error.message}`,
      );
    },
    fetching(city) {
      console.log(`\nFetching weather for ${city}...`);
    },
    fetchFailed(city) {
      console.log(`Failed to fetch weather data for ${city}`);
    },
    observed(_city, summary, units) {
      for (const line of formatObservationLines(summary, units)) {
        console.log(line);
      }
    },
    archived(city) {
      console.log(`Weather data for ${city} saved to S3!`);
    },
    archiveFailed(city) {
      console.log(`Failed to save weather data for ${city}`);
    },
  };
}
