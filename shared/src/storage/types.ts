/**
 * Storage types shared by the worker and any API process
 */

export interface S3StorageConfig {
  /** Endpoint used for server-side transfers (e.g. http://minio:9000) */
  endpoint?: string;
  /** Endpoint clients reach; presigned URLs are issued against it */
  publicEndpoint?: string;
  bucket: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle?: boolean;
}

export interface PresignedUpload {
  url: string;
  /** Headers the client should send; not part of the signature */
  headers: Record<string, string>;
  expiresAt: Date;
}

/**
 * Object store gateway: signed URLs plus byte transfer on behalf of steps.
 * Stateless per call. Transfers stop when `signal` aborts.
 */
export interface StorageBackend {
  presignGet(key: string, expirySeconds: number): Promise<string>;
  presignPut(
    key: string,
    contentType: string | undefined,
    expirySeconds: number
  ): Promise<PresignedUpload>;
  uploadFile(
    localPath: string,
    key: string,
    contentType?: string,
    signal?: AbortSignal
  ): Promise<void>;
  downloadToFile(key: string, localPath: string, signal?: AbortSignal): Promise<void>;
  readText(key: string, signal?: AbortSignal): Promise<string>;
  exists(key: string, signal?: AbortSignal): Promise<boolean>;
}

export class ObjectNotFoundError extends Error {
  constructor(readonly key: string) {
    super(`Object not found in storage: ${key}`);
    this.name = 'ObjectNotFoundError';
  }
}
