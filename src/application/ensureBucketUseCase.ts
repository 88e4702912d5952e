import {
  BucketEnsureError,
  err,
  ok,
  type Result,
  toError,
} from '@/domain/entities';
import type { ArchiveRepository } from '@/domain/repositories';

export type BucketStatus = 'exists' | 'created';

export interface EnsureBucketUseCaseDeps {
  archiveRepository: ArchiveRepository;
}

/**
 * Make sure the archive bucket exists before anything is written to it.
 *
 * Any failure of the existence check leads to a creation attempt, whatever its
 * cause (a missing bucket, a bucket in another region, or denied access alike).
 * A failed creation is returned, never thrown.
 */
export class EnsureBucketUseCase {
  private readonly archiveRepository: ArchiveRepository;

  constructor(deps: EnsureBucketUseCaseDeps) {
    this.archiveRepository = deps.archiveRepository;
  }

  async execute(): Promise<Result<BucketStatus, BucketEnsureError>> {
    const bucket = this.archiveRepository.bucket;

    try {
      await this.archiveRepository.headBucket();
      console.log(`Bucket ${bucket} exists`);
      return ok<BucketStatus>('exists');
    } catch (error) {
      console.log(
        `Bucket check failed for ${bucket}: ${toError(error).message}`,
      );
    }

    console.log(`Creating bucket ${bucket}`);
    try {
      await this.archiveRepository.createBucket();
      console.log(`Successfully created bucket ${bucket}`);
      return ok<BucketStatus>('created');
    } catch (error) {
      const cause = toError(error);
      console.error(`Error creating bucket: ${cause.message}`);
      return err(
        new BucketEnsureError(
          bucket,
          `Failed to create bucket ${bucket}: ${cause.message}`,
          { cause },
        ),
      );
    }
  }
}
