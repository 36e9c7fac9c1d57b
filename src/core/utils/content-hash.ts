import { createHash } from 'node:crypto'
import type { WorkloadSpec } from '../types/workload'

/**
 * Deterministic cache key over the spec fields that affect build output.
 * `environmentId` is the canonical environment, so `c++` and `cpp` share builds.
 */
export function contentHash(
  spec: Pick<WorkloadSpec, 'code' | 'dependencies' | 'options'>,
  environmentId: string,
): string {
  const payload = JSON.stringify({
    language: environmentId,
    code: spec.code,
    dependencies: [...spec.dependencies],
    options: [...spec.options],
  })

  return createHash('sha256').update(payload).digest('hex')
}
