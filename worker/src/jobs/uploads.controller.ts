import { Body, Controller, Post } from '@nestjs/common';
import { PresignUploadInputSchema } from '@media-pipeline/shared';
import { JobsService, type PresignedUploadView } from './jobs.service';
import { parseBody } from './parse-body';

@Controller('uploads')
export class UploadsController {
  constructor(private readonly jobsService: JobsService) {}

  /**
   * Signed PUT URL the client uploads to directly; the returned key is
   * then passed to POST /jobs
   */
  @Post('presign')
  async presign(@Body() body: unknown): Promise<PresignedUploadView> {
    return this.jobsService.presignUpload(parseBody(PresignUploadInputSchema, body));
  }
}
