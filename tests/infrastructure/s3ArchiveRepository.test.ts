import {
  CreateBucketCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { mockClient } from 'aws-sdk-client-mock';
import { beforeEach, describe, expect, it } from 'vitest';
import { S3ArchiveRepository } from '@/infrastructure';

const s3Mock = mockClient(S3Client);

function serviceError(name: string, status: number): S3ServiceException {
  return new S3ServiceException({
    name,
    $fault: 'client',
    $metadata: { httpStatusCode: status },
    message: name,
  });
}

describe('S3ArchiveRepository', () => {
  beforeEach(() => {
    s3Mock.reset();
  });

  describe('headBucket', () => {
    it('should send HeadBucket for the configured bucket', async () => {
      s3Mock.on(HeadBucketCommand).resolves({});

      const repository = new S3ArchiveRepository('test-bucket', 'us-east-1');
      await repository.headBucket();

      const calls = s3Mock.commandCalls(HeadBucketCommand);
      expect(calls).toHaveLength(1);
      expect(calls[0].args[0].input).toEqual({ Bucket: 'test-bucket' });
    });

    it('should propagate errors from S3', async () => {
      s3Mock.on(HeadBucketCommand).rejects(serviceError('NotFound', 404));

      const repository = new S3ArchiveRepository('test-bucket', 'us-east-1');

      await expect(repository.headBucket()).rejects.toThrow('NotFound');
    });
  });

  describe('createBucket', () => {
    it('should create the bucket without location constraint in us-east-1', async () => {
      s3Mock.on(CreateBucketCommand).resolves({});

      const repository = new S3ArchiveRepository('test-bucket', 'us-east-1');
      await repository.createBucket();

      const calls = s3Mock.commandCalls(CreateBucketCommand);
      expect(calls).toHaveLength(1);
      expect(calls[0].args[0].input).toEqual({ Bucket: 'test-bucket' });
    });

    it('should create the bucket without location constraint when no region is set', async () => {
      s3Mock.on(CreateBucketCommand).resolves({});

      const repository = new S3ArchiveRepository('test-bucket');
      await repository.createBucket();

      expect(s3Mock.commandCalls(CreateBucketCommand)[0].args[0].input).toEqual(
        { Bucket: 'test-bucket' },
      );
    });

    it('should pass the region as location constraint outside us-east-1', async () => {
      s3Mock.on(CreateBucketCommand).resolves({});

      const repository = new S3ArchiveRepository('test-bucket', 'eu-west-1');
      await repository.createBucket();

      expect(s3Mock.commandCalls(CreateBucketCommand)[0].args[0].input).toEqual(
        {
          Bucket: 'test-bucket',
          CreateBucketConfiguration: { LocationConstraint: 'eu-west-1' },
        },
      );
    });

    it('should reject regions S3 does not know without calling S3', async () => {
      const repository = new S3ArchiveRepository('test-bucket', 'mars-north-1');

      await expect(repository.createBucket()).rejects.toThrow(
        'Unsupported bucket region: mars-north-1',
      );
      expect(s3Mock.commandCalls(CreateBucketCommand)).toHaveLength(0);
    });
  });

  describe('putObject', () => {
    it('should upload the body with key and content type', async () => {
      s3Mock.on(PutObjectCommand).resolves({});

      const repository = new S3ArchiveRepository('test-bucket', 'us-east-1');
      await repository.putObject(
        'weather-data/Nairobi-20250107-090503.json',
        '{"timestamp":"20250107-090503"}',
        'application/json',
      );

      const calls = s3Mock.commandCalls(PutObjectCommand);
      expect(calls).toHaveLength(1);
      expect(calls[0].args[0].input).toEqual({
        Bucket: 'test-bucket',
        Key: 'weather-data/Nairobi-20250107-090503.json',
        Body: '{"timestamp":"20250107-090503"}',
        ContentType: 'application/json',
      });
    });

    it('should use an injected client', async () => {
      const client = new S3Client({ region: 'us-east-1' });
      s3Mock.on(PutObjectCommand).rejects(serviceError('AccessDenied', 403));

      const repository = new S3ArchiveRepository(
        'test-bucket',
        'us-east-1',
        client,
      );

      await expect(
        repository.putObject('weather-data/a.json', '{}', 'application/json'),
      ).rejects.toThrow('AccessDenied');
    });
  });
});
