import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3StorageBackend, type StorageBackend } from '@media-pipeline/shared';
import { FFmpegService } from './services/ffmpeg.service';
import { STORAGE_BACKEND, StorageService } from './services/storage.service';

@Global()
@Module({
  providers: [
    {
      provide: STORAGE_BACKEND,
      useFactory: (configService: ConfigService): StorageBackend => {
        const accessKeyId = configService.get<string>('storage.accessKeyId');
        const secretAccessKey = configService.get<string>('storage.secretAccessKey');
        if (!accessKeyId || !secretAccessKey) {
          throw new Error(
            'S3 storage configuration is incomplete. Please check S3 environment variables.'
          );
        }

        return new S3StorageBackend({
          endpoint: configService.get<string>('storage.endpoint'),
          publicEndpoint: configService.get<string>('storage.publicEndpoint'),
          bucket: configService.get<string>('storage.bucket', 'media-local'),
          region: configService.get<string>('storage.region', 'us-east-1'),
          accessKeyId,
          secretAccessKey,
          forcePathStyle: configService.get<boolean>('storage.forcePathStyle', false),
        });
      },
      inject: [ConfigService],
    },
    StorageService,
    FFmpegService,
  ],
  exports: [StorageService, FFmpegService],
})
export class SharedModule {}
