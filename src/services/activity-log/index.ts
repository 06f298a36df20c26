export { ActivityLog } from './activity-log.js';
export type { ActivityLogOptions, LogEntry, LogOutcome } from './activity-log.js';
