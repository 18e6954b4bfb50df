import {
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  UseFilters,
} from '@nestjs/common';
import { CreateJobInputSchema, type JobView } from '@media-pipeline/shared';
import { JobsService, type CreatedJob } from './jobs.service';
import { parseBody } from './parse-body';
import { PipelineExceptionFilter } from './pipeline-exception.filter';

@Controller('jobs')
@UseFilters(PipelineExceptionFilter)
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  async create(@Body() body: unknown): Promise<CreatedJob> {
    return this.jobsService.createJob(parseBody(CreateJobInputSchema, body));
  }

  @Get(':id')
  async get(@Param('id') id: string): Promise<JobView> {
    return this.jobsService.getJob(id);
  }

  @Get(':id/outputs/:index/manifest.m3u8')
  @Header('Content-Type', 'application/vnd.apple.mpegurl')
  @Header('Cache-Control', 'no-store')
  async manifest(
    @Param('id') id: string,
    @Param('index', ParseIntPipe) index: number
  ): Promise<string> {
    return this.jobsService.getHlsManifest(id, index);
  }
}
