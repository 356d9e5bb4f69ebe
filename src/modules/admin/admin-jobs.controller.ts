import { Controller, Get, Param, Post, Query, UseGuards } from '@nestjs/common';
import { JobsService } from '../jobs/jobs.service';
import { JobsStatusService } from '../jobs/jobs-status.service';
import { JOBS, type JobName } from '../jobs/jobs.constants';
import { AdminGuard } from './admin.guard';

function isTruthy(raw: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes(String(raw ?? '').trim().toLowerCase());
}

@UseGuards(AdminGuard)
@Controller('admin/jobs')
export class AdminJobsController {
  constructor(
    private readonly jobs: JobsService,
    private readonly jobsStatus: JobsStatusService,
  ) {}

  @Get('status/:jobId')
  async jobStatus(@Param('jobId') jobId: string) {
    return { data: await this.jobsStatus.getStatus(String(jobId ?? '').trim()) };
  }

  /** Same stable id as the scheduler, so a manual start never runs a second listener. */
  @Post('stream-listen')
  async runStreamListen() {
    const job = await this.jobs.enqueueCron(JOBS.streamListen, {}, 'cron:streamListen');
    return { data: { ok: true, jobId: String(job.id) } };
  }

  @Post('users-refresh')
  async runUsersRefresh(@Query('wait') wait?: string) {
    return { data: await this.enqueueAndMaybeWait(JOBS.usersRefresh, isTruthy(wait)) };
  }

  @Post('replies-sweep')
  async runRepliesSweep(@Query('wait') wait?: string) {
    return { data: await this.enqueueAndMaybeWait(JOBS.postsRepliesSweep, isTruthy(wait)) };
  }

  private async enqueueAndMaybeWait(name: JobName, shouldWait: boolean) {
    const job = await this.jobs.enqueue(name, {}, { removeOnComplete: true, removeOnFail: false });
    const jobId = String(job.id);
    if (!shouldWait) return { ok: true, jobId };
    const res = await this.jobsStatus.waitForCompletion(jobId, 25_000);
    return { ok: res.ok, jobId, result: res.ok ? res.result : null, waitError: res.ok ? null : res.reason };
  }
}
