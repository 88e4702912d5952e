import {
  ArchiveError,
  buildArchiveKey,
  err,
  formatArchiveTimestamp,
  ok,
  type Result,
  stampObservation,
  toError,
  type WeatherObservation,
} from '@/domain/entities';
import type { ArchiveRepository } from '@/domain/repositories';

export const ARCHIVE_CONTENT_TYPE = 'application/json';

export interface ArchiveReceipt {
  bucket: string | undefined;
  key: string;
  timestamp: string;
}

export interface ArchiveObservationUseCaseDeps {
  archiveRepository: ArchiveRepository;
  clock?: () => Date;
}

/**
 * Use case for archiving one observation.
 * Flow: Stamp with local time → Serialize → Upload under weather-data/{city}-{timestamp}.json
 *
 * Keys have one-second resolution. A second upload for the same city within
 * the same second replaces the first; it is reported with a warning.
 */
export class ArchiveObservationUseCase {
  private readonly archiveRepository: ArchiveRepository;
  private readonly clock: () => Date;
  private readonly writtenKeys = new Set<string>();

  constructor(deps: ArchiveObservationUseCaseDeps) {
    this.archiveRepository = deps.archiveRepository;
    this.clock = deps.clock ?? (() => new Date());
  }

  async execute(
    observation: WeatherObservation | null,
    city: string,
  ): Promise<Result<ArchiveReceipt, ArchiveError>> {
    if (!observation) {
      return err(
        new ArchiveError(
          city,
          'no-observation',
          `No weather data to save for ${city}`,
        ),
      );
    }

    const timestamp = formatArchiveTimestamp(this.clock());
    const key = buildArchiveKey(city, timestamp);

    if (this.writtenKeys.has(key)) {
      console.warn(
        `[Archive Warning] Overwriting ${key} written earlier in this run`,
      );
    }

    const body = JSON.stringify(stampObservation(observation, timestamp));

    try {
      await this.archiveRepository.putObject(key, body, ARCHIVE_CONTENT_TYPE);
    } catch (error) {
      const cause = toError(error);
      console.error(`Error saving to S3: ${cause.message}`);
      return err(
        new ArchiveError(
          city,
          'upload-failed',
          `Failed to save ${key}: ${cause.message}`,
          key,
          { cause },
        ),
      );
    }

    this.writtenKeys.add(key);
    console.log(`Successfully saved data for ${city} to S3`);
    return ok({ bucket: this.archiveRepository.bucket, key, timestamp });
  }
}
