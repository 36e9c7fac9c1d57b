import type { SamplerConfig } from '../core/types'
import { NullSampler, type EnergySampler } from './energy-sampler'
import { PowercapSampler } from './powercap-sampler'

export { NullSampler, PowercapSampler, type EnergySampler }
export type { PowercapSamplerOptions } from './powercap-sampler'
export { SamplerGate, type SamplingWindow } from './sampler-gate'

export function createSampler(config: SamplerConfig): EnergySampler {
  switch (config.type) {
    case 'none':
      return new NullSampler()
    case 'powercap':
      return new PowercapSampler({ root: config.root, zones: config.zones })
  }
}
