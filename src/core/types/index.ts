export * from './workload'
export * from './execution'
export * from './summary'
export * from './harness-config'
