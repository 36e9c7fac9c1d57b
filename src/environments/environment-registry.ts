import type { Environment } from './environment'
import { builtInEnvironments } from './languages'

export class EnvironmentRegistryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'EnvironmentRegistryError'
  }
}

/**
 * Static alias table from a spec's `language` to its environment
 */
export class EnvironmentRegistry {
  private byAlias = new Map<string, Environment>()
  private environments = new Map<string, Environment>()

  constructor(customEnvironments: Environment[] = []) {
    builtInEnvironments.forEach((environment) => this.register(environment))

    // Custom environments replace built-ins that share an alias
    customEnvironments.forEach((environment) => this.register(environment))
  }

  find(language: string): Environment | undefined {
    return this.byAlias.get(normalizeAlias(language))
  }

  getEnvironment(language: string): Environment {
    const environment = this.find(language)
    if (!environment) {
      throw new EnvironmentRegistryError(`No environment for language: ${language}`)
    }
    return environment
  }

  hasEnvironment(language: string): boolean {
    return this.byAlias.has(normalizeAlias(language))
  }

  listEnvironments(): Environment[] {
    return Array.from(this.environments.values())
  }

  private register(environment: Environment): void {
    this.environments.set(environment.id, environment)
    environment.aliases.forEach((alias) => this.byAlias.set(normalizeAlias(alias), environment))
  }
}

function normalizeAlias(language: string): string {
  return language.trim().toLowerCase()
}
