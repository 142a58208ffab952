import { describe, it, expect } from "vitest";
import { chainfeedConfigSchema } from "./schema.ts";

describe("chainfeedConfigSchema", () => {
  const baseConfig = {
    chain: {
      id: 137,
      rpcUrl: "https://polygon-rpc.example.com",
    },
    contracts: {
      agentRegistry: "0x61447385B019187daa48e91c55c02AF1F1f3F863",
      scannerRegistry: "0xbF2920129f83d75DeC95D97A879942cCe3DcD387",
      dispatch: "0xd46832F3f8EA8bDEFe5316696c0364F01b31a573",
    },
  };

  describe("chain config", () => {
    it("should validate minimal config", () => {
      const result = chainfeedConfigSchema.safeParse(baseConfig);
      expect(result.success).toBe(true);
    });

    it("should reject invalid RPC URL", () => {
      const result = chainfeedConfigSchema.safeParse({
        ...baseConfig,
        chain: { id: 137, rpcUrl: "not-a-url" },
      });
      expect(result.success).toBe(false);
    });

    it("should reject non-positive chain ID", () => {
      const result = chainfeedConfigSchema.safeParse({
        ...baseConfig,
        chain: { id: 0, rpcUrl: "https://polygon-rpc.example.com" },
      });
      expect(result.success).toBe(false);
    });
  });

  describe("contracts config", () => {
    it("should reject invalid address", () => {
      const result = chainfeedConfigSchema.safeParse({
        ...baseConfig,
        contracts: { ...baseConfig.contracts, dispatch: "0x1234" },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe("Invalid Ethereum address");
      }
    });

    it("should reject two roles sharing an address", () => {
      const result = chainfeedConfigSchema.safeParse({
        ...baseConfig,
        contracts: {
          ...baseConfig.contracts,
          dispatch: baseConfig.contracts.agentRegistry.toLowerCase(),
        },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe(
          'Contract "dispatch" has the same address as "agentRegistry"'
        );
        expect(result.error.issues[0].path).toEqual(["contracts", "dispatch"]);
      }
    });
  });

  describe("feed config", () => {
    it("should accept full feed config", () => {
      const result = chainfeedConfigSchema.safeParse({
        ...baseConfig,
        feed: {
          startBlock: 25_000_000,
          blockOffset: 5,
          maxBlockAge: 3600,
          pollingInterval: 1000,
          cacheSize: 500,
        },
      });
      expect(result.success).toBe(true);
    });

    it("should reject options the feed does not support", () => {
      const result = chainfeedConfigSchema.safeParse({
        ...baseConfig,
        feed: { blockOffset: 5, tracing: true },
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].path).toEqual(["feed"]);
        expect(result.error.issues[0].message).toBe("Unrecognized key(s) in object: 'tracing'");
      }
    });

    it("should reject negative block offset", () => {
      const result = chainfeedConfigSchema.safeParse({
        ...baseConfig,
        feed: { blockOffset: -1 },
      });
      expect(result.success).toBe(false);
    });

    it("should reject fractional start block", () => {
      const result = chainfeedConfigSchema.safeParse({
        ...baseConfig,
        feed: { startBlock: 10.5 },
      });
      expect(result.success).toBe(false);
    });
  });

  describe("logging config", () => {
    it("should validate all log levels", () => {
      for (const level of ["error", "warn", "info", "debug", "trace"]) {
        const result = chainfeedConfigSchema.safeParse({
          ...baseConfig,
          logging: { level },
        });
        expect(result.success).toBe(true);
      }
    });

    it("should reject unknown log level", () => {
      const result = chainfeedConfigSchema.safeParse({
        ...baseConfig,
        logging: { level: "verbose" },
      });
      expect(result.success).toBe(false);
    });
  });

  describe("health config", () => {
    it("should reject out of range port", () => {
      const result = chainfeedConfigSchema.safeParse({
        ...baseConfig,
        health: { enabled: true, port: 70000 },
      });
      expect(result.success).toBe(false);
    });
  });
});
