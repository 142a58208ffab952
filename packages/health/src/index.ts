export type { HealthStatus, HealthReport, HealthReporter, HealthChecker, Summarizer } from './types.ts';
export { checkerFrom, obfuscateDetails, summarizeReports } from './checker.ts';
export { HealthServer } from './HealthServer.ts';
export type { HealthServerOptions } from './HealthServer.ts';
