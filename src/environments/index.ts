export {
  SourceEnvironment,
  commandForPackage,
  type Environment,
  type BuildStep,
  type CompileContext,
} from './environment'
export { EnvironmentRegistry, EnvironmentRegistryError } from './environment-registry'
export {
  CEnvironment,
  CppEnvironment,
  CSharpEnvironment,
  JavaEnvironment,
  JavaScriptEnvironment,
  PythonEnvironment,
  RustEnvironment,
  builtInEnvironments,
} from './languages'
export { PathToolchainProbe, StaticToolchainProbe, type ToolchainProbe } from './toolchain-probe'
