export { awaitReport, type AwaitReportOptions } from './await-report.js';
export { buildReportSpecification, toCalendarDate, toQueryPayload, type QueryPayload, type ReportSpecificationInput } from './specification.js';
export { submitReportJob, type SubmitReportJobOptions } from './submit.js';
