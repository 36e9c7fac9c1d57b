import { ZodError } from 'zod'
import { HarnessConfig, HarnessConfigSchema } from '../types'
import { ConfigValidationError } from './errors'

/**
 * Validates a configuration object against the schema
 * @param config Raw configuration object to validate
 * @returns Validated configuration with defaults applied
 * @throws ConfigValidationError if validation fails
 */
export default function validateConfig(config: unknown): HarnessConfig {
  try {
    return HarnessConfigSchema.parse(config)
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError(error.issues)
    }
    throw error
  }
}
