import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { PipelineModule } from '../pipeline/pipeline.module';
import { QueueModule } from '../queue/queue.module';
import { DispatcherProcessor } from './dispatcher.processor';
import { DispatcherService } from './dispatcher.service';
import { RecoveryService } from './recovery.service';

@Module({
  imports: [LedgerModule, PipelineModule, QueueModule],
  providers: [DispatcherService, DispatcherProcessor, RecoveryService],
  exports: [DispatcherService],
})
export class DispatcherModule {}
