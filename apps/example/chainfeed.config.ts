import { defineConfig } from "@chainfeed/config";

/**
 * Registry contracts on Polygon; replace the addresses with the deployments to follow
 */
export default defineConfig({
  chain: {
    id: 137,
    rpcUrl: process.env.RPC_URL ?? "http://localhost:8545",
    timeout: 30_000,
    retryCount: 3,
  },

  contracts: {
    agentRegistry: "0x1111111111111111111111111111111111111111",
    scannerRegistry: "0x2222222222222222222222222222222222222222",
    dispatch: "0x3333333333333333333333333333333333333333",
  },

  feed: {
    /**
     * Confirmation depth. Polygon reorgs are usually shallower than this,
     * so a handler never sees a block that is later replaced.
     */
    blockOffset: 32,
    /** Skip blocks older than ten minutes after a long pause */
    maxBlockAge: 600,
  },

  logging: {
    level: "info",
    timestamps: true,
  },

  health: {
    enabled: true,
    port: 8090,
  },
});
