export { backoffDelay, backoffSchedule, pollUntilTerminal } from './poller.js';
export { classifyReportState, classifyReportStatus, isTerminalState } from './state-machine.js';
export type { PollAttempt, PollClassification, PollOptions } from './types.js';
