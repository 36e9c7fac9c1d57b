export { SpecRegistry, parseWorkload, type LoadResult } from './spec-registry'
export {
  collectWorkloadFiles,
  readWorkloadFiles,
  WORKLOAD_EXTENSIONS,
  type WorkloadSourceInput,
  type TextSource,
  type ParsedSource,
} from './workload-files'
