import {
  DeleteObjectsCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  NotFound,
  NoSuchBucket,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { SyncFailure } from '../errors.js';
import type { ObjectStore, RemoteObject, SiteFile } from '../types.js';

const DELETE_BATCH_SIZE = 1000;

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client = new S3Client({})) {}

  async bucketExists(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (error) {
      if (error instanceof NotFound || error instanceof NoSuchBucket) {
        return false;
      }
      throw error;
    }
  }

  async listObjects(bucket: string): Promise<RemoteObject[]> {
    const objects: RemoteObject[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(new ListObjectsV2Command({
        Bucket: bucket,
        ContinuationToken: continuationToken,
      }));
      for (const object of response.Contents ?? []) {
        if (object.Key !== undefined) {
          objects.push({ key: object.Key, etag: object.ETag });
        }
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return objects;
  }

  async putObject(bucket: string, file: SiteFile): Promise<void> {
    await this.client.send(new PutObjectCommand({
      Bucket: bucket,
      Key: file.path,
      Body: file.body,
      ContentType: file.contentType,
    }));
  }

  async deleteObjects(bucket: string, keys: readonly string[]): Promise<void> {
    for (let start = 0; start < keys.length; start += DELETE_BATCH_SIZE) {
      const batch = keys.slice(start, start + DELETE_BATCH_SIZE);
      const response = await this.client.send(new DeleteObjectsCommand({
        Bucket: bucket,
        Delete: {
          Objects: batch.map((key) => ({ Key: key })),
          Quiet: true,
        },
      }));

      const failed = response.Errors ?? [];
      if (failed.length > 0) {
        const details = failed.map((entry) => `${entry.Key}: ${entry.Message ?? entry.Code}`).join(', ');
        throw new SyncFailure(`Failed to delete ${failed.length} objects from s3://${bucket}: ${details}`);
      }
    }
  }
}
