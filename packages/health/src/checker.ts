import type { HealthChecker, HealthReport, HealthReporter, HealthStatus, Summarizer } from './types.ts';

/**
 * Severity order used when summarizing; later is worse
 */
const STATUS_SEVERITY: Record<HealthStatus, number> = {
  ok: 0,
  info: 1,
  unknown: 2,
  error: 3,
  down: 4,
};

const URL_PATTERN = /\b(?:https?|wss?):\/\/[^\s"',]+/g;

/**
 * Reduce every URL in a details string to its host, so credentials
 * and API keys in RPC endpoints never reach the health endpoint
 */
export function obfuscateDetails(details: string): string {
  return details.replace(URL_PATTERN, (match) => (URL.canParse(match) ? new URL(match).host : '<url>'));
}

/**
 * Make a checker from reporters; report names are prefixed with the reporter name
 */
export function checkerFrom(summarizer: Summarizer | null, ...reporters: HealthReporter[]): HealthChecker {
  return () => {
    const allReports: HealthReport[] = [];
    for (const reporter of reporters) {
      for (const report of reporter.health()) {
        allReports.push({
          name: report.name.length === 0 ? `service.${reporter.name()}` : `service.${reporter.name()}.${report.name}`,
          status: report.status,
          details: obfuscateDetails(report.details),
        });
      }
    }
    if (summarizer) {
      allReports.push(summarizer(allReports));
    }
    return allReports;
  };
}

/**
 * Summary carrying the worst status and the names that caused it
 */
export const summarizeReports: Summarizer = (reports) => {
  let worst: HealthStatus = 'ok';
  for (const report of reports) {
    if (STATUS_SEVERITY[report.status] > STATUS_SEVERITY[worst]) {
      worst = report.status;
    }
  }

  const culprits = reports.filter((report) => report.status === worst && worst !== 'ok').map((report) => report.name);

  return {
    name: 'summary',
    status: worst,
    details: culprits.join(', '),
  };
};
