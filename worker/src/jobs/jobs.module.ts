import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { QueueModule } from '../queue/queue.module';
import { DownloadResolverService } from './download-resolver.service';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';
import { UploadsController } from './uploads.controller';

@Module({
  imports: [LedgerModule, QueueModule],
  controllers: [JobsController, UploadsController],
  providers: [JobsService, DownloadResolverService],
  exports: [JobsService],
})
export class JobsModule {}
