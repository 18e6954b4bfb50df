import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import {
  S3StorageBackend,
  SIGNING_NONCE_PARAM,
  writeStreamToFile,
} from '../s3-backend';

// Signing happens locally; no request leaves the process
const backend = () =>
  new S3StorageBackend(
    {
      endpoint: 'http://minio:9000',
      publicEndpoint: 'http://localhost:9000',
      bucket: 'test-bucket',
      region: 'us-east-1',
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      forcePathStyle: true,
    },
    () => Date.UTC(2024, 0, 1, 0, 0, 0)
  );

describe('S3StorageBackend presigning', () => {
  it('signs GET URLs against the public endpoint', async () => {
    const url = new URL(await backend().presignGet('outputs/x/a.jpg', 900));

    expect(url.origin).toBe('http://localhost:9000');
    expect(url.pathname).toBe('/test-bucket/outputs/x/a.jpg');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('900');
    expect(url.searchParams.get('X-Amz-Date')).toBe('20240101T000000Z');
  });

  it('returns a different URL for every request of the same key', async () => {
    const storage = backend();
    const first = new URL(await storage.presignGet('outputs/x/a.jpg', 900));
    const second = new URL(await storage.presignGet('outputs/x/a.jpg', 900));

    expect(first.href).not.toBe(second.href);
    expect(first.pathname).toBe(second.pathname);
    expect(first.searchParams.get(SIGNING_NONCE_PARAM)).not.toBe(
      second.searchParams.get(SIGNING_NONCE_PARAM)
    );
    expect(first.searchParams.get('X-Amz-Signature')).not.toBe(
      second.searchParams.get('X-Amz-Signature')
    );
  });

  it('keeps signing with the current clock through a burst of requests', async () => {
    const storage = backend();
    const urls: string[] = [];
    for (let i = 0; i < 200; i++) {
      urls.push(await storage.presignGet(`outputs/x/seg_${i}.ts`, 900));
    }
    urls.push(await storage.presignGet('uploads/u1_clip.mp4', 900));

    expect(new Set(urls).size).toBe(201);
    expect(new URL(urls[200]).searchParams.get('X-Amz-Date')).toBe(
      '20240101T000000Z'
    );
  });

  it('echoes the content type as a header without signing it', async () => {
    const upload = await backend().presignPut(
      'uploads/u1_clip.mp4',
      'video/mp4',
      600
    );

    expect(upload.headers).toEqual({ 'Content-Type': 'video/mp4' });
    expect(upload.expiresAt.toISOString()).toBe('2024-01-01T00:10:00.000Z');
    const signedHeaders =
      new URL(upload.url).searchParams.get('X-Amz-SignedHeaders') ?? '';
    expect(signedHeaders.split(';')).not.toContain('content-type');
  });
});

describe('writeStreamToFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'media-pipeline-s3-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes every chunk in order', async () => {
    const target = path.join(dir, 'clip.bin');
    await writeStreamToFile(
      Readable.from([Buffer.from('one-'), Buffer.from('two-'), Buffer.from('three')]),
      target
    );

    expect(await readFile(target, 'utf8')).toBe('one-two-three');
  });

  it('rejects when the file cannot be written', async () => {
    const target = path.join(dir, 'missing', 'clip.bin');

    await expect(
      writeStreamToFile(Readable.from([Buffer.from('a'), Buffer.from('b')]), target)
    ).rejects.toThrow(/ENOENT/);
  });

  it('stops when the signal aborts', async () => {
    const controller = new AbortController();
    controller.abort(new Error('step timed out'));

    await expect(
      writeStreamToFile(
        Readable.from([Buffer.from('a')]),
        path.join(dir, 'aborted.bin'),
        controller.signal
      )
    ).rejects.toThrow();
  });
});
