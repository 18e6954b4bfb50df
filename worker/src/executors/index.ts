/**
 * Step executors
 *
 * Exports the executor contract, the registry and the ffmpeg implementations.
 */

export * from './interfaces';
export * from './executor-registry';
export * from './ffmpeg/base-ffmpeg.executor';
export * from './ffmpeg/thumbnail.executor';
export * from './ffmpeg/watermark.executor';
export * from './ffmpeg/transcode-720p.executor';
export * from './ffmpeg/hls-720p.executor';
