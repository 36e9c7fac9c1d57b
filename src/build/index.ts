export { Builder, type BuilderOptions, type BuilderDeps, type BuildStats } from './builder'
