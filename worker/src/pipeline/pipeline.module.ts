import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_RETRY_CONFIG, type RetryConfig } from '@media-pipeline/shared';
import { ExecutorsModule } from '../executors/executors.module';
import { LedgerModule } from '../ledger/ledger.module';
import { PipelineEngineService } from './pipeline-engine.service';
import { StepRetryPolicy } from './step-retry-policy';

@Module({
  imports: [LedgerModule, ExecutorsModule],
  providers: [
    {
      provide: StepRetryPolicy,
      useFactory: (configService: ConfigService) =>
        new StepRetryPolicy(
          configService.get<RetryConfig>('retry', DEFAULT_RETRY_CONFIG)
        ),
      inject: [ConfigService],
    },
    PipelineEngineService,
  ],
  exports: [PipelineEngineService],
})
export class PipelineModule {}
