import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  S3Client,
  HeadBucketCommand,
  CreateBucketCommand,
  PutObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import { S3ServiceOptions, StorageClient } from '../types/storage.js';
import { ErrorHandler, StorageError } from '../utils/errorHandler.js';

/**
 * Storage client backed by Amazon S3 (or any S3-compatible endpoint)
 */
export class S3Service implements StorageClient {
  private s3Client: S3Client;

  constructor(options: S3ServiceOptions = {}) {
    this.s3Client = new S3Client({
      region: options.region || process.env.AWS_REGION || 'us-east-1',
      endpoint: options.endpoint,
      forcePathStyle: options.forcePathStyle,
      requestHandler: {
        requestTimeout: 300000, // 5 minutes for individual requests
        connectionTimeout: 60000, // 1 minute to establish connection
      },
      // Retries are left to the SDK; the batch engine never retries
      maxAttempts: options.maxAttempts ?? 5,
    });
  }

  /**
   * Creates the bucket unless it already exists
   */
  async createContainerIfNotExists(container: string): Promise<void> {
    try {
      await this.s3Client.send(new HeadBucketCommand({ Bucket: container }));
      return;
    } catch (error) {
      const { name, statusCode } = ErrorHandler.inspect(error);
      if (name !== 'NotFound' && name !== 'NoSuchBucket' && statusCode !== 404) {
        console.error('Bucket access validation failed:', error);
        throw ErrorHandler.handleStorageError(error, container);
      }
    }

    try {
      await this.s3Client.send(new CreateBucketCommand({ Bucket: container }));
      console.log(`Created container ${container}`);
    } catch (error) {
      if (ErrorHandler.inspect(error).name === 'BucketAlreadyOwnedByYou') {
        return;
      }
      console.error(`Failed to create container ${container}:`, error);
      throw ErrorHandler.handleStorageError(error, container);
    }
  }

  /**
   * Streams a local file into the bucket under objectName
   */
  async putObject(container: string, objectName: string, localPath: string): Promise<void> {
    let body: fs.ReadStream | undefined;
    try {
      const stats = await fs.promises.stat(localPath);
      body = fs.createReadStream(localPath);

      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: container,
          Key: objectName,
          Body: body,
          ContentLength: stats.size,
          ContentType: 'application/octet-stream',
        })
      );
    } catch (error) {
      throw ErrorHandler.handleStorageError(error, container, objectName);
    } finally {
      // A rejected send may leave the file unread and open
      body?.destroy();
    }
  }

  /**
   * Writes an object to localPath, creating its parent directory
   */
  async getObject(container: string, objectName: string, localPath: string): Promise<void> {
    try {
      const response = await this.s3Client.send(
        new GetObjectCommand({
          Bucket: container,
          Key: objectName,
        })
      );

      const body = response.Body;
      if (!(body instanceof Readable)) {
        throw new StorageError(`Object '${objectName}' returned no readable body`);
      }

      try {
        await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
      } catch (error) {
        // Release the response socket back to the pool
        body.destroy();
        throw error;
      }
      await pipeline(body, fs.createWriteStream(localPath));
    } catch (error) {
      throw ErrorHandler.handleStorageError(error, container, objectName);
    }
  }

  /**
   * Lists every key in the bucket, following continuation tokens
   */
  async listObjects(container: string, prefix?: string): Promise<string[]> {
    const objectNames: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const response = await this.s3Client.send(
          new ListObjectsV2Command({
            Bucket: container,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          })
        );

        for (const object of response.Contents ?? []) {
          if (object.Key) {
            objectNames.push(object.Key);
          }
        }

        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw ErrorHandler.handleStorageError(error, container);
    }

    return objectNames;
  }
}
