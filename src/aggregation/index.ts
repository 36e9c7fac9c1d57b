export { Aggregator, summarizeTrials, type AggregatorOptions } from './aggregator'
