import { Controller, Get } from '@nestjs/common';
import { QueueService, type QueueMetrics } from '../queue/queue.service';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  uptime: number;
  queue: QueueMetrics;
}

@Controller('health')
export class HealthController {
  constructor(private readonly queueService: QueueService) {}

  @Get()
  async check(): Promise<HealthStatus> {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      queue: await this.queueService.getQueueMetrics(),
    };
  }
}
