import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { JobsService } from './jobs.service';
import { parseOrThrow } from '../validation/parse-or-throw';
import { jobIdSchema, submitJobBodySchema } from '../validation/schemas';

@Controller('jobs')
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  // 202: accepted for asynchronous processing
  @HttpCode(202)
  @Post()
  async submit(@Body() body: unknown) {
    const { bytes, task } = parseOrThrow(submitJobBodySchema, body);
    return this.jobsService.submit(bytes, task);
  }

  @Get(':id')
  async getStatus(@Param('id') id: unknown) {
    const jobId = parseOrThrow(jobIdSchema, id, { scope: 'id' });
    return this.jobsService.getStatus(jobId);
  }

  @Get(':id/result')
  async getResult(@Param('id') id: unknown) {
    const jobId = parseOrThrow(jobIdSchema, id, { scope: 'id' });
    return this.jobsService.getResult(jobId);
  }
}
