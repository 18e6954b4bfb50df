import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { HttpRequest } from '@smithy/protocol-http';
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type {
  PresignedUpload,
  S3StorageConfig,
  StorageBackend,
} from './types';
import { ObjectNotFoundError } from './types';

function isNotFound(error: unknown): boolean {
  return (
    error instanceof S3ServiceException &&
    (error.name === 'NotFound' ||
      error.name === 'NoSuchKey' ||
      error.$metadata.httpStatusCode === 404)
  );
}

/** Query parameter carrying the per-URL nonce; covered by the signature */
export const SIGNING_NONCE_PARAM = 'x-request-nonce';

/**
 * Write a stream to disk with backpressure. Rejects with the first read or
 * write error; a partial file is left for the caller to clean up.
 */
export async function writeStreamToFile(
  source: Readable,
  localPath: string,
  signal?: AbortSignal
): Promise<void> {
  await pipeline(source, fs.createWriteStream(localPath), { signal });
}

/**
 * S3-compatible storage backend implementation
 * Supports AWS S3, MinIO, Backblaze B2, Cloudflare R2, etc.
 */
export class S3StorageBackend implements StorageBackend {
  private readonly client: S3Client;
  private readonly presignClient: S3Client;
  private readonly bucket: string;

  constructor(
    config: S3StorageConfig,
    private readonly now: () => number = Date.now
  ) {
    this.bucket = config.bucket;

    const credentials = {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    };

    this.client = new S3Client({
      endpoint: config.endpoint,
      region: config.region,
      credentials,
      forcePathStyle: config.forcePathStyle ?? false,
    });

    // Presigned URLs must carry the host the client will actually reach
    this.presignClient = new S3Client({
      endpoint: config.publicEndpoint ?? config.endpoint,
      region: config.region,
      credentials,
      forcePathStyle: config.forcePathStyle ?? false,
    });

    // SigV4 dates have one-second resolution; a random signed parameter
    // keeps two URLs for the same key distinct within the same second
    this.presignClient.middlewareStack.add(
      (next) => async (args) => {
        if (HttpRequest.isInstance(args.request)) {
          args.request.query[SIGNING_NONCE_PARAM] = randomUUID();
        }
        return next(args);
      },
      { step: 'build', name: 'signingNonceMiddleware' }
    );
  }

  async presignGet(key: string, expirySeconds: number): Promise<string> {
    try {
      return await getSignedUrl(
        this.presignClient,
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
        { expiresIn: expirySeconds, signingDate: new Date(this.now()) }
      );
    } catch (error) {
      throw new Error(
        `Failed to generate signed URL for ${key}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  /**
   * Presigned PUT for direct uploads. ContentType is left out of the
   * signature so clients that omit or alter the header still succeed.
   */
  async presignPut(
    key: string,
    contentType: string | undefined,
    expirySeconds: number
  ): Promise<PresignedUpload> {
    const signingDate = new Date(this.now());
    try {
      const url = await getSignedUrl(
        this.presignClient,
        new PutObjectCommand({ Bucket: this.bucket, Key: key }),
        { expiresIn: expirySeconds, signingDate }
      );

      return {
        url,
        headers: contentType ? { 'Content-Type': contentType } : {},
        expiresAt: new Date(signingDate.getTime() + expirySeconds * 1000),
      };
    } catch (error) {
      throw new Error(
        `Failed to generate upload URL for ${key}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  async uploadFile(
    localPath: string,
    key: string,
    contentType?: string,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucket,
        Key: key,
        Body: fs.createReadStream(localPath),
        ContentType: contentType,
      },
    });
    const onAbort = () => {
      // done() rejects once the abort lands; that is where the failure surfaces
      upload.abort().catch(() => undefined);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await upload.done();
    } catch (error) {
      throw new Error(
        `Failed to upload file to S3 at ${key}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async getObject(key: string, signal?: AbortSignal) {
    try {
      return await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
        { abortSignal: signal }
      );
    } catch (error) {
      if (isNotFound(error)) {
        throw new ObjectNotFoundError(key);
      }
      throw new Error(
        `Failed to download file from S3 at ${key}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  async downloadToFile(
    key: string,
    localPath: string,
    signal?: AbortSignal
  ): Promise<void> {
    const { Body: body } = await this.getObject(key, signal);
    if (!(body instanceof Readable)) {
      throw new Error(`No readable body in S3 response for ${key}`);
    }

    await writeStreamToFile(body, localPath, signal);
  }

  async readText(key: string, signal?: AbortSignal): Promise<string> {
    const { Body: body } = await this.getObject(key, signal);
    if (!body) {
      throw new Error(`No body in S3 response for ${key}`);
    }
    return body.transformToString();
  }

  async exists(key: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key }),
        { abortSignal: signal }
      );
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }
}
