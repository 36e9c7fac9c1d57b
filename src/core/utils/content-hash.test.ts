import { describe, it, expect } from '@jest/globals'
import { contentHash } from './content-hash'

describe('contentHash', () => {
  const spec = {
    code: 'int main(void) { return 0; }',
    dependencies: ['gcc'],
    options: ['-O3'],
  }

  it('should be a stable sha256 hex digest', () => {
    const hash = contentHash(spec, 'c')

    expect(hash).toMatch(/^[0-9a-f]{64}$/)
    expect(contentHash({ ...spec }, 'c')).toBe(hash)
  })

  it('should change when code changes', () => {
    expect(contentHash({ ...spec, code: 'int main(void) { return 1; }' }, 'c')).not.toBe(contentHash(spec, 'c'))
  })

  it('should change when build options or dependencies change', () => {
    const base = contentHash(spec, 'c')

    expect(contentHash({ ...spec, options: ['-O2'] }, 'c')).not.toBe(base)
    expect(contentHash({ ...spec, dependencies: ['gcc', 'clang'] }, 'c')).not.toBe(base)
  })

  it('should depend on the environment', () => {
    expect(contentHash(spec, 'cpp')).not.toBe(contentHash(spec, 'c'))
  })
})
