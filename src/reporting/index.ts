export { ReportCollector } from './report-collector'
export {
  CLIReporter,
  type CLIReporterOptions,
  JSONReporter,
  type JSONReporterOptions,
  type JSONReport,
  CSVReporter,
  type CSVReporterOptions,
  CSV_COLUMNS,
} from './reporters'
export { writeReports, type WriteReportsOptions, JSON_REPORT_FILENAME, CSV_REPORT_FILENAME } from './write-reports'
