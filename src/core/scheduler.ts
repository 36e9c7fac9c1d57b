import { EventEmitter } from 'events'
import { toError } from './errors'
import { logger } from '../logger'

export interface Job {
  id: string
}

export interface JobOutcome<TJob extends Job, TResult> {
  job: TJob
  result?: TResult
  error?: Error
}

export interface SchedulerEvents<TJob extends Job, TResult> {
  jobStart: (job: TJob) => void
  jobComplete: (job: TJob, result: TResult) => void
  jobFailed: (job: TJob, error: Error) => void
  queueEmpty: () => void
  allJobsComplete: (outcomes: JobOutcome<TJob, TResult>[]) => void
}

export interface SchedulerConfig {
  concurrency: number
}

/**
 * Job scheduler with bounded concurrency. A failed job is reported and the
 * rest keep running; `stop()` drains the queue and lets active jobs finish.
 */
export class Scheduler<TJob extends Job, TResult> extends EventEmitter {
  private config: SchedulerConfig
  private queue: TJob[] = []
  private activeJobs = new Map<string, TJob>()
  private outcomes: JobOutcome<TJob, TResult>[] = []
  private isRunning = false
  private jobHandler?: (job: TJob) => Promise<TResult>

  constructor(config: SchedulerConfig) {
    super()
    this.config = config
  }

  setJobHandler(handler: (job: TJob) => Promise<TResult>): void {
    this.jobHandler = handler
  }

  addJobs(jobs: TJob[]): void {
    this.queue.push(...jobs)
    this.processQueue()
  }

  addJob(job: TJob): void {
    this.queue.push(job)
    this.processQueue()
  }

  async run(): Promise<JobOutcome<TJob, TResult>[]> {
    if (this.isRunning) {
      throw new Error('Scheduler is already running')
    }

    if (!this.jobHandler) {
      throw new Error('Job handler must be set before running scheduler')
    }

    this.isRunning = true
    this.outcomes = []

    return new Promise((resolve, reject) => {
      this.once('allJobsComplete', resolve)
      this.once('error', reject)
      this.processQueue()
    })
  }

  /**
   * Drops queued jobs; jobs already running finish and are reported
   */
  stop(): void {
    const dropped = this.queue.length
    this.queue.length = 0
    if (dropped > 0) {
      logger.debug(`Scheduler stopped, ${dropped} queued job(s) dropped`)
    }
    this.processQueue()
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      queueSize: this.queue.length,
      activeJobs: this.activeJobs.size,
      completedJobs: this.outcomes.length,
    }
  }

  private processQueue(): void {
    const handler = this.jobHandler
    if (!this.isRunning || !handler) {
      return
    }

    while (this.activeJobs.size < this.config.concurrency) {
      const job = this.queue.shift()
      if (!job) break

      this.activeJobs.set(job.id, job)
      this.processJob(job, handler).catch((error: unknown) => {
        logger.error(`Unexpected error processing job ${job.id}:`, error)
        this.emit('error', toError(error))
      })
    }

    if (this.queue.length === 0 && this.activeJobs.size === 0) {
      this.emit('queueEmpty')
      this.isRunning = false
      this.emit('allJobsComplete', this.outcomes)
    }
  }

  private async processJob(job: TJob, handler: (job: TJob) => Promise<TResult>): Promise<void> {
    this.emit('jobStart', job)

    try {
      const result = await handler(job)
      this.activeJobs.delete(job.id)
      this.outcomes.push({ job, result })
      this.emit('jobComplete', job, result)
    } catch (error) {
      const jobError = toError(error)
      this.activeJobs.delete(job.id)
      this.outcomes.push({ job, error: jobError })
      this.emit('jobFailed', job, jobError)
    }

    this.processQueue()
  }
}

export function createScheduler<TJob extends Job, TResult>(config: SchedulerConfig): Scheduler<TJob, TResult> {
  return new Scheduler<TJob, TResult>(config)
}
