import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { PermanentStepError } from '@media-pipeline/shared';
import * as fs from 'fs';
import * as path from 'path';
import { InMemoryStorageBackend } from '@/__mocks__/storage-backend';
import { StorageService } from '../storage.service';

vi.mock('@nestjs/common', async () => {
  const actual = await vi.importActual<typeof import('@nestjs/common')>(
    '@nestjs/common'
  );
  const { MockLogger } = await import('@/__mocks__/logger');
  return { ...actual, Logger: MockLogger };
});

describe('StorageService', () => {
  let backend: InMemoryStorageBackend;
  let service: StorageService;
  let dir: string;

  beforeEach(async () => {
    backend = new InMemoryStorageBackend();
    service = new StorageService(
      backend,
      new ConfigService({ storage: { presignExpirySeconds: 600 } })
    );
    dir = await service.createTempDir('job/1');
  });

  afterEach(async () => {
    await service.cleanupTemp(dir);
  });

  it('signs with the configured expiry', async () => {
    expect(await service.getUrl('outputs/a.jpg')).toBe(
      'https://storage.test/outputs/a.jpg?expires=600&sig=1'
    );
  });

  it('creates sanitized temp directories', () => {
    expect(path.basename(dir).startsWith('media-pipeline-job_1-')).toBe(true);
    expect(fs.existsSync(dir)).toBe(true);
  });

  it('downloads into the directory under the key base name', async () => {
    backend.put('uploads/abc_clip.mp4', 'video-bytes');

    const localPath = await service.downloadToTemp('uploads/abc_clip.mp4', dir);

    expect(localPath).toBe(path.join(dir, 'abc_clip.mp4'));
    expect(fs.readFileSync(localPath, 'utf8')).toBe('video-bytes');
  });

  it('treats a missing input object as a permanent failure', async () => {
    await expect(service.downloadToTemp('uploads/missing.mp4', dir)).rejects.toBeInstanceOf(
      PermanentStepError
    );
  });

  it('uploads a directory in name order, skipping listed files', async () => {
    fs.writeFileSync(path.join(dir, 'seg_0001.ts'), 'b');
    fs.writeFileSync(path.join(dir, 'seg_0000.ts'), 'a');
    fs.writeFileSync(path.join(dir, 'index.m3u8'), '#EXTM3U');

    const keys = await service.uploadDirectory(
      dir,
      'outputs/clip/hls',
      { '.ts': 'video/mp2t' },
      { skip: ['index.m3u8'] }
    );

    expect(keys).toEqual(['outputs/clip/hls/seg_0000.ts', 'outputs/clip/hls/seg_0001.ts']);
    expect(backend.uploads).toEqual([
      { key: 'outputs/clip/hls/seg_0000.ts', contentType: 'video/mp2t' },
      { key: 'outputs/clip/hls/seg_0001.ts', contentType: 'video/mp2t' },
    ]);
  });

  it('hands the abort signal to every transfer', async () => {
    const controller = new AbortController();
    backend.put('uploads/abc_clip.mp4', 'video-bytes');
    fs.writeFileSync(path.join(dir, 'seg_0000.ts'), 'a');

    await service.downloadToTemp('uploads/abc_clip.mp4', dir, controller.signal);
    await service.uploadDirectory(dir, 'outputs/clip/hls', {}, {
      skip: ['abc_clip.mp4'],
      signal: controller.signal,
    });
    await service.exists('outputs/clip/hls/seg_0000.ts', controller.signal);

    expect(backend.signals).toEqual([
      controller.signal,
      controller.signal,
      controller.signal,
    ]);
  });

  it('does not start a download once the signal has aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('step timed out'));
    backend.put('uploads/abc_clip.mp4', 'video-bytes');

    await expect(
      service.downloadToTemp('uploads/abc_clip.mp4', dir, controller.signal)
    ).rejects.toThrow('step timed out');
    expect(fs.existsSync(path.join(dir, 'abc_clip.mp4'))).toBe(false);
  });

  it('removes temp directories on cleanup', async () => {
    await service.cleanupTemp(dir);
    expect(fs.existsSync(dir)).toBe(false);
  });
});
