/**
 * Repository interface for the object store that keeps archived observations.
 *
 * All methods throw on failure; use cases decide whether a failure is fatal.
 */
export interface ArchiveRepository {
  /** Name of the bucket this repository writes to */
  readonly bucket: string | undefined;

  /**
   * Check that the bucket is reachable.
   * @throws {Error} If the bucket is missing, in another region, or access is denied
   */
  headBucket(): Promise<void>;

  createBucket(): Promise<void>;

  /**
   * Write an object, replacing any object already stored under the key.
   */
  putObject(key: string, body: string, contentType: string): Promise<void>;
}
