import type { SamplerReading } from '../core/types/execution'

/**
 * Boundary to the energy-sampling subsystem. One window at a time:
 * every `start()` that returns true is matched by exactly one `stop()`.
 */
export interface EnergySampler {
  readonly name: string
  // false means the subsystem is unavailable and nothing must be measured
  start(): Promise<boolean>
  stop(): Promise<SamplerReading>
}

/**
 * Grants every window and reports no energy; for timing-only runs
 */
export class NullSampler implements EnergySampler {
  readonly name = 'none'
  private open = false

  async start(): Promise<boolean> {
    if (this.open) {
      throw new Error('Sampling window already open')
    }
    this.open = true
    return true
  }

  async stop(): Promise<SamplerReading> {
    if (!this.open) {
      throw new Error('No sampling window is open')
    }
    this.open = false
    return {}
  }
}
