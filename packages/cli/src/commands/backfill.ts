import { openSession, runSession, type CommonOptions } from "./session.ts";

/**
 * Backfill options
 */
interface BackfillOptions extends CommonOptions {
  from: bigint;
  to: bigint;
  rate: number;
}

/**
 * Handle a bounded block range at a limited rate
 */
export async function backfillCommand(options: BackfillOptions): Promise<void> {
  const session = await openSession(options);
  if (!session) return;

  await runSession(session, (runner) => runner.backfill(options.from, options.to, options.rate));
}
