import {
  ObjectNotFoundError,
  type PresignedUpload,
  type StorageBackend,
} from '@media-pipeline/shared';
import * as fs from 'fs';

/**
 * Object store held in a Map. Signed URLs carry a counter so every call
 * returns a different string. Transfers record the signal they were given
 * and refuse to start once it has aborted.
 */
export class InMemoryStorageBackend implements StorageBackend {
  readonly objects = new Map<string, Buffer>();
  readonly uploads: { key: string; contentType?: string }[] = [];
  readonly signals: (AbortSignal | undefined)[] = [];
  private signatures = 0;

  put(key: string, body: string | Buffer): void {
    this.objects.set(key, Buffer.from(body));
  }

  async presignGet(key: string, expirySeconds: number): Promise<string> {
    this.signatures += 1;
    return `https://storage.test/${key}?expires=${expirySeconds}&sig=${this.signatures}`;
  }

  async presignPut(
    key: string,
    contentType: string | undefined,
    expirySeconds: number
  ): Promise<PresignedUpload> {
    this.signatures += 1;
    return {
      url: `https://storage.test/${key}?upload=1&sig=${this.signatures}`,
      headers: contentType ? { 'Content-Type': contentType } : {},
      expiresAt: new Date(Date.UTC(2024, 0, 1) + expirySeconds * 1000),
    };
  }

  async uploadFile(
    localPath: string,
    key: string,
    contentType?: string,
    signal?: AbortSignal
  ): Promise<void> {
    this.observe(signal);
    this.objects.set(key, await fs.promises.readFile(localPath));
    this.uploads.push({ key, contentType });
  }

  async downloadToFile(
    key: string,
    localPath: string,
    signal?: AbortSignal
  ): Promise<void> {
    this.observe(signal);
    await fs.promises.writeFile(localPath, this.read(key));
  }

  async readText(key: string, signal?: AbortSignal): Promise<string> {
    this.observe(signal);
    return this.read(key).toString('utf8');
  }

  async exists(key: string, signal?: AbortSignal): Promise<boolean> {
    this.observe(signal);
    return this.objects.has(key);
  }

  private observe(signal: AbortSignal | undefined): void {
    this.signals.push(signal);
    signal?.throwIfAborted();
  }

  private read(key: string): Buffer {
    const body = this.objects.get(key);
    if (!body) {
      throw new ObjectNotFoundError(key);
    }
    return body;
  }
}
