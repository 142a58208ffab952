import { openSession, runSession, type CommonOptions } from "./session.ts";

/**
 * Follow the chain from the configured start block
 */
export async function listenCommand(options: CommonOptions): Promise<void> {
  const session = await openSession(options);
  if (!session) return;

  await runSession(session, (runner) => runner.listen());
}
