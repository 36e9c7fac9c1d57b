/* eslint-disable no-console */
import { describe, it, expect, jest, afterEach } from '@jest/globals'
import { Logger } from './logger'

describe('Logger', () => {
  afterEach(() => {
    delete process.env.JOULEBENCH_LOG_LEVEL
    jest.restoreAllMocks()
  })

  it('should take its level from JOULEBENCH_LOG_LEVEL', () => {
    process.env.JOULEBENCH_LOG_LEVEL = 'DEBUG'

    expect(new Logger().getLevel()).toBe('debug')
  })

  it('should fall back to info for names that are not levels', () => {
    process.env.JOULEBENCH_LOG_LEVEL = 'toString'

    expect(new Logger().getLevel()).toBe('info')
  })

  it('should drop messages below the current level', () => {
    const write = jest.spyOn(console, 'error').mockImplementation(() => undefined)
    const logger = new Logger('test', 'warn')

    logger.info('hidden')
    logger.warn('shown')

    expect(write).toHaveBeenCalledTimes(1)
    expect(String(write.mock.calls[0]?.[0])).toContain('shown')
  })
})
