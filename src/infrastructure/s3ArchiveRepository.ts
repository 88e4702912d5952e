import {
  BucketLocationConstraint,
  CreateBucketCommand,
  type CreateBucketCommandInput,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import type { ArchiveRepository } from '@/domain/repositories';

/**
 * Region a bucket lands in when no LocationConstraint is sent
 */
const DEFAULT_S3_REGION = 'us-east-1';

function toLocationConstraint(
  region: string,
): BucketLocationConstraint | undefined {
  return Object.values(BucketLocationConstraint).find(
    (constraint) => constraint === region,
  );
}

export class S3ArchiveRepository implements ArchiveRepository {
  readonly bucket: string | undefined;
  private readonly region: string | undefined;
  private readonly client: S3Client;

  constructor(bucket: string | undefined, region?: string, client?: S3Client) {
    this.bucket = bucket;
    this.region = region;
    this.client = client ?? new S3Client(region ? { region } : {});
  }

  async headBucket(): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
  }

  async createBucket(): Promise<void> {
    const input: CreateBucketCommandInput = { Bucket: this.bucket };

    // us-east-1 rejects an explicit LocationConstraint, every other region requires one
    if (this.region && this.region !== DEFAULT_S3_REGION) {
      const constraint = toLocationConstraint(this.region);
      if (!constraint) {
        throw new Error(`Unsupported bucket region: ${this.region}`);
      }
      input.CreateBucketConfiguration = { LocationConstraint: constraint };
    }

    await this.client.send(new CreateBucketCommand(input));
  }

  async putObject(
    key: string,
    body: string,
    contentType: string,
  ): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      }),
    );
  }
}
