import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { BullModule } from '@nestjs/bullmq';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from './config/configuration';
import { validateEnv } from './config/validation.schema';
import { SharedModule } from './shared/shared.module';
import { LedgerModule } from './ledger/ledger.module';
import { QueueModule } from './queue/queue.module';
import { ExecutorsModule } from './executors/executors.module';
import { PipelineModule } from './pipeline/pipeline.module';
import { DispatcherModule } from './dispatcher/dispatcher.module';
import { JobsModule } from './jobs/jobs.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate: validateEnv,
      envFilePath: ['.env', '../.env'],
    }),

    // BullMQ Queue
    BullModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get<string>('redis.host'),
          port: configService.get<number>('redis.port'),
          password: configService.get<string>('redis.password'),
        },
      }),
      inject: [ConfigService],
    }),

    // Scheduling
    ScheduleModule.forRoot(),

    // Feature modules
    SharedModule,
    LedgerModule,
    QueueModule,
    ExecutorsModule,
    PipelineModule,
    DispatcherModule,
    JobsModule,
    HealthModule,
  ],
})
export class AppModule {}
