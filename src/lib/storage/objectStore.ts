/**
 * Object store contract used by the partition walker, artifact collector and
 * recipient directory, plus its S3 implementation.
 */

import {
  GetObjectCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandOutput,
  S3Client,
} from '@aws-sdk/client-s3';
import { StorageError } from '../errors';

export interface ObjectStore {
  /** Immediate child prefixes of `prefix`, delimiter-bounded, in listing order */
  listChildPrefixes(bucket: string, prefix: string): Promise<string[]>;
  /** Keys under `prefix` (any depth) ending with `suffix`, compared case-insensitively */
  listObjectsWithSuffix(bucket: string, prefix: string, suffix: string): Promise<string[]>;
  getObject(bucket: string, key: string): Promise<Buffer>;
}

const DELIMITER = '/';

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  async listChildPrefixes(bucket: string, prefix: string): Promise<string[]> {
    const prefixes: string[] = [];
    await this.paginate('listChildPrefixes', bucket, prefix, DELIMITER, (page) => {
      for (const commonPrefix of page.CommonPrefixes ?? []) {
        if (commonPrefix.Prefix) prefixes.push(commonPrefix.Prefix);
      }
    });
    return prefixes;
  }

  async listObjectsWithSuffix(bucket: string, prefix: string, suffix: string): Promise<string[]> {
    const wanted = suffix.toLowerCase();
    const keys: string[] = [];
    await this.paginate('listObjectsWithSuffix', bucket, prefix, undefined, (page) => {
      for (const object of page.Contents ?? []) {
        if (object.Key && object.Key.toLowerCase().endsWith(wanted)) {
          keys.push(object.Key);
        }
      }
    });
    return keys;
  }

  async getObject(bucket: string, key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        throw new Error('Empty response body');
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      throw new StorageError('getObject', bucket, key, error);
    }
  }

  private async paginate(
    operation: 'listChildPrefixes' | 'listObjectsWithSuffix',
    bucket: string,
    prefix: string,
    delimiter: string | undefined,
    onPage: (page: ListObjectsV2CommandOutput) => void
  ): Promise<void> {
    let continuationToken: string | undefined;
    do {
      let page: ListObjectsV2CommandOutput;
      try {
        page = await this.client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            Delimiter: delimiter,
            ContinuationToken: continuationToken,
          })
        );
      } catch (error) {
        throw new StorageError(operation, bucket, prefix, error);
      }
      onPage(page);
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
  }
}
