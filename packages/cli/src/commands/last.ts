import { openSession, runSession, type CommonOptions } from "./session.ts";

/**
 * Handle the registry logs of the most recent blocks once
 */
export async function lastCommand(blocks: bigint, options: CommonOptions): Promise<void> {
  const session = await openSession(options);
  if (!session) return;

  await runSession(session, async (runner) => {
    await runner.processLastBlocks(blocks);
    session.logger.info(`Processed the last ${blocks} blocks`);
    return null;
  });
}
