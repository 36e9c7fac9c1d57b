import { readFile, readdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { SamplerReading } from '../core/types/execution'
import type { EnergySampler } from './energy-sampler'
import { logger } from '../logger'

export interface PowercapSamplerOptions {
  root?: string
  // Zone directory names; all top-level package zones when omitted
  zones?: string[]
}

interface ZoneCounter {
  zone: string
  energyUj: number
  maxRangeUj: number
}

const PACKAGE_ZONE = /^intel-rapl:\d+$/

/**
 * Reads RAPL energy counters through the Linux powercap interface
 * (`<root>/<zone>/energy_uj`). Counters wrap at `max_energy_range_uj`.
 */
export class PowercapSampler implements EnergySampler {
  readonly name = 'powercap'
  private root: string
  private configuredZones?: string[]
  private startCounters: ZoneCounter[] | null = null

  constructor(options: PowercapSamplerOptions = {}) {
    this.root = options.root ?? '/sys/class/powercap'
    this.configuredZones = options.zones
  }

  async start(): Promise<boolean> {
    if (this.startCounters) {
      throw new Error('Sampling window already open')
    }

    try {
      const zones = await this.resolveZones()
      if (zones.length === 0) {
        logger.warn(`No RAPL package zones found under ${this.root}`)
        return false
      }
      this.startCounters = await Promise.all(zones.map((zone) => this.readCounter(zone)))
      return true
    } catch (error) {
      logger.warn(`Powercap counters unreadable: ${error instanceof Error ? error.message : String(error)}`)
      return false
    }
  }

  async stop(): Promise<SamplerReading> {
    const startCounters = this.startCounters
    if (!startCounters) {
      throw new Error('No sampling window is open')
    }
    this.startCounters = null

    const endCounters = await Promise.all(startCounters.map((counter) => this.readCounter(counter.zone)))

    let totalUj = 0
    startCounters.forEach((before, index) => {
      const after = endCounters[index]
      if (!after) return

      let delta = after.energyUj - before.energyUj
      if (delta < 0) {
        delta += before.maxRangeUj
      }
      totalUj += delta
    })

    return { energyJoules: totalUj / 1e6 }
  }

  private async resolveZones(): Promise<string[]> {
    if (this.configuredZones && this.configuredZones.length > 0) {
      return this.configuredZones
    }

    const entries = await readdir(this.root)
    return entries.filter((entry) => PACKAGE_ZONE.test(entry)).sort()
  }

  private async readCounter(zone: string): Promise<ZoneCounter> {
    const energyUj = await readNumber(join(this.root, zone, 'energy_uj'))
    const maxRangeUj = await readNumber(join(this.root, zone, 'max_energy_range_uj'))
    return { zone, energyUj, maxRangeUj }
  }
}

async function readNumber(path: string): Promise<number> {
  const content = (await readFile(path, 'utf-8')).trim()
  const value = Number(content)
  if (!Number.isFinite(value)) {
    throw new Error(`Unexpected counter value in ${path}: ${content}`)
  }
  return value
}
