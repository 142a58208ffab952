/**
 * Health status, from healthy to unreachable
 */
export type HealthStatus = 'ok' | 'info' | 'error' | 'down' | 'unknown';

/**
 * Single health report
 */
export interface HealthReport {
  name: string;
  status: HealthStatus;
  details: string;
}

/**
 * Component that can describe its own health
 */
export interface HealthReporter {
  name(): string;
  health(): HealthReport[];
}

/**
 * Produces the full report list served on /health
 */
export type HealthChecker = () => HealthReport[];

/**
 * Condenses reports into one summary report
 */
export type Summarizer = (reports: readonly HealthReport[]) => HealthReport;
