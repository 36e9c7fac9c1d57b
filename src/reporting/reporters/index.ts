export { CLIReporter, type CLIReporterOptions } from './cli-reporter'
export { JSONReporter, type JSONReporterOptions, type JSONReport } from './json-reporter'
export { CSVReporter, type CSVReporterOptions, CSV_COLUMNS } from './csv-reporter'
