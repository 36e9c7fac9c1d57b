import type { SamplerReading } from '../core/types/execution'
import type { SpecRef } from '../core/errors'
import { MeasurementUnavailable, toError } from '../core/errors'
import { Mutex } from '../core/utils/semaphore'
import type { EnergySampler } from './energy-sampler'
import { logger } from '../logger'

export interface SamplingWindow {
  readonly owner: SpecRef
  // Closes the window; later calls return the first reading
  close(): Promise<SamplerReading>
}

/**
 * Serialises access to the process-wide sampler so that at most one
 * window is ever open.
 *
 * The first MeasurementUnavailable marks the gate as failed. Every later
 * `withWindow` rethrows that error without calling `start()` until `reset()`.
 */
export class SamplerGate {
  private mutex = new Mutex()
  private openWindows = 0
  private maxObservedWindows = 0
  private failure: MeasurementUnavailable | null = null

  constructor(private sampler: EnergySampler) {}

  /**
   * Holds the gate while `body` runs. The body receives the open window and
   * decides when to close it; the gate closes it afterwards if it did not.
   * A refused `start()` releases the gate and throws MeasurementUnavailable
   * without calling `stop()`.
   */
  async withWindow<T>(owner: SpecRef, body: (window: SamplingWindow) => Promise<T>): Promise<T> {
    const release = await this.mutex.acquire()

    try {
      if (this.failure) {
        throw this.failure
      }

      let granted: boolean
      try {
        granted = await this.sampler.start()
      } catch (error) {
        throw this.fail(new MeasurementUnavailable(owner, toError(error).message))
      }

      if (!granted) {
        throw this.fail(new MeasurementUnavailable(owner, `${this.sampler.name} sampler refused to start`))
      }

      this.openWindows++
      this.maxObservedWindows = Math.max(this.maxObservedWindows, this.openWindows)

      let closing: Promise<SamplerReading> | undefined
      const window: SamplingWindow = {
        owner,
        close: () => {
          if (!closing) {
            closing = this.stopSampler(owner)
          }
          return closing
        },
      }

      let result: T
      try {
        result = await body(window)
      } catch (error) {
        if (!closing) {
          await window.close().catch((closeError: unknown) => {
            logger.error(`Failed to close sampling window: ${toError(closeError).message}`)
          })
        }
        throw error
      }

      if (!closing) {
        logger.debug(`Closing sampling window left open by ${owner.name}`)
      }
      await window.close()
      return result
    } finally {
      release()
    }
  }

  /**
   * The error that put the gate out of service, if any
   */
  getFailure(): MeasurementUnavailable | null {
    return this.failure
  }

  reset(): void {
    this.failure = null
  }

  /**
   * Number of windows currently open (0 or 1)
   */
  getOpenWindows(): number {
    return this.openWindows
  }

  getMaxObservedWindows(): number {
    return this.maxObservedWindows
  }

  isBusy(): boolean {
    return this.mutex.isLocked()
  }

  private async stopSampler(owner: SpecRef): Promise<SamplerReading> {
    try {
      return await this.sampler.stop()
    } catch (error) {
      throw this.fail(new MeasurementUnavailable(owner, `stop failed: ${toError(error).message}`))
    } finally {
      this.openWindows--
    }
  }

  private fail(error: MeasurementUnavailable): MeasurementUnavailable {
    if (!this.failure) {
      this.failure = error
    }
    return this.failure
  }
}
