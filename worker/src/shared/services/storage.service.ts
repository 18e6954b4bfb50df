import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ObjectNotFoundError,
  PermanentStepError,
  type PresignedUpload,
  type StorageBackend,
} from '@media-pipeline/shared';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const STORAGE_BACKEND = Symbol('STORAGE_BACKEND');

const TEMP_PREFIX = 'media-pipeline-';

/**
 * Worker-side facade over the object store: signing, temp-dir transfers and
 * directory uploads for steps that emit more than one file.
 */
@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);
  private readonly presignExpirySeconds: number;

  constructor(
    @Inject(STORAGE_BACKEND) private readonly backend: StorageBackend,
    configService: ConfigService
  ) {
    this.presignExpirySeconds = configService.get<number>(
      'storage.presignExpirySeconds',
      900
    );
  }

  /**
   * Fresh signed GET URL; never cached
   */
  async getUrl(key: string, expirySeconds = this.presignExpirySeconds): Promise<string> {
    return this.backend.presignGet(key, expirySeconds);
  }

  async getUploadUrl(
    key: string,
    contentType?: string,
    expirySeconds = this.presignExpirySeconds
  ): Promise<PresignedUpload> {
    return this.backend.presignPut(key, contentType, expirySeconds);
  }

  async exists(key: string, signal?: AbortSignal): Promise<boolean> {
    return this.backend.exists(key, signal);
  }

  async readText(key: string): Promise<string> {
    return this.backend.readText(key);
  }

  /**
   * Download an object into `dir`, keeping its base name.
   *
   * @throws PermanentStepError when the object does not exist
   */
  async downloadToTemp(
    key: string,
    dir: string,
    signal?: AbortSignal
  ): Promise<string> {
    const localPath = path.join(dir, path.posix.basename(key));
    try {
      await this.backend.downloadToFile(key, localPath, signal);
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        throw new PermanentStepError(`Input object not found: ${key}`, {
          cause: error,
        });
      }
      throw error;
    }
    this.logger.debug(`Downloaded ${key} to ${localPath}`);
    return localPath;
  }

  async uploadFromPath(
    localPath: string,
    key: string,
    contentType?: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.backend.uploadFile(localPath, key, contentType, signal);
    this.logger.log(`Uploaded file to storage: ${key}`);
  }

  /**
   * Upload every regular file in `dir` under `prefix`, sorted by name.
   * Files listed in `options.skip` are left for the caller.
   *
   * @returns the keys written
   */
  async uploadDirectory(
    dir: string,
    prefix: string,
    contentTypes: Record<string, string>,
    options: { skip?: readonly string[]; signal?: AbortSignal } = {}
  ): Promise<string[]> {
    const skip = options.skip ?? [];
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    const names = entries
      .filter((entry) => entry.isFile() && !skip.includes(entry.name))
      .map((entry) => entry.name)
      .sort();

    const keys: string[] = [];
    for (const name of names) {
      const key = `${prefix}/${name}`;
      await this.backend.uploadFile(
        path.join(dir, name),
        key,
        contentTypes[path.extname(name).toLowerCase()],
        options.signal
      );
      keys.push(key);
    }
    this.logger.log(`Uploaded ${keys.length} files under ${prefix}`);
    return keys;
  }

  async createTempDir(label: string): Promise<string> {
    const safeLabel = label.replace(/[^a-zA-Z0-9_-]/g, '_');
    return fs.promises.mkdtemp(path.join(os.tmpdir(), `${TEMP_PREFIX}${safeLabel}-`));
  }

  async cleanupTemp(dir: string): Promise<void> {
    try {
      await fs.promises.rm(dir, { recursive: true, force: true });
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to cleanup temp directory ${dir}: ${errorMessage}`);
    }
  }
}
