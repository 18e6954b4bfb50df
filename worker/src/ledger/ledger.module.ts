import {
  Inject,
  Injectable,
  Logger,
  Module,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { LedgerDriver } from '@media-pipeline/shared';
import { JOB_LEDGER, type JobLedger } from './job-ledger';
import { InMemoryJobLedger } from './in-memory-job-ledger';
import { RedisJobLedger } from './redis-job-ledger';

export const LEDGER_REDIS = Symbol('LEDGER_REDIS');

/**
 * Closes the ledger's Redis connection on shutdown
 */
@Injectable()
class LedgerConnectionCloser implements OnApplicationShutdown {
  constructor(@Inject(LEDGER_REDIS) private readonly redis: Redis | null) {}

  async onApplicationShutdown() {
    if (this.redis) {
      await this.redis.quit();
    }
  }
}

@Module({
  providers: [
    {
      provide: LEDGER_REDIS,
      useFactory: (configService: ConfigService): Redis | null => {
        if (configService.get<string>('ledger.driver') === LedgerDriver.MEMORY) {
          return null;
        }
        return new Redis({
          host: configService.get<string>('redis.host'),
          port: configService.get<number>('redis.port'),
          password: configService.get<string>('redis.password'),
          maxRetriesPerRequest: 3,
        });
      },
      inject: [ConfigService],
    },
    {
      provide: JOB_LEDGER,
      useFactory: (redis: Redis | null): JobLedger => {
        const logger = new Logger('LedgerModule');
        if (!redis) {
          logger.warn('Using in-memory job ledger; jobs will not survive a restart');
          return new InMemoryJobLedger();
        }
        logger.log('Using Redis job ledger');
        return new RedisJobLedger(redis);
      },
      inject: [LEDGER_REDIS],
    },
    LedgerConnectionCloser,
  ],
  exports: [JOB_LEDGER],
})
export class LedgerModule {}
