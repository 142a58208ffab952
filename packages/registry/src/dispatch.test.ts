import { describe, it, expect, vi } from "vitest";
import { TEST_CONTRACTS, createLogFixture, createMockLogger } from "@chainfeed/testing";
import { dispatchMessage, type HandlerContext, type RegistryHandlers } from "./dispatch.ts";
import type { RegistryMessage } from "./messages/types.ts";

const TX_HASH = `0x${"01".repeat(32)}`;

describe("dispatchMessage", () => {
  const context: HandlerContext = {
    logger: createMockLogger(),
    log: createLogFixture({ blockNumber: 1n, logIndex: 0, address: TEST_CONTRACTS.dispatch }),
  };

  const messages: RegistryMessage[] = [
    {
      action: "SaveAgent",
      agentId: "0x1",
      txHash: TX_HASH,
      enabled: true,
      name: "agent",
      chainIds: [1],
      metadata: "agent",
      owner: "0x1000000000000000000000000000000000000001",
    },
    { action: "EnableAgent", agentId: "0x1", txHash: TX_HASH },
    { action: "DisableAgent", agentId: "0x1", txHash: TX_HASH },
    {
      action: "SaveScanner",
      scannerId: "0x2",
      txHash: TX_HASH,
      enabled: true,
      chainId: 1,
      metadata: "scanner",
    },
    { action: "EnableScanner", scannerId: "0x2", txHash: TX_HASH },
    { action: "DisableScanner", scannerId: "0x2", txHash: TX_HASH },
    { action: "Link", agentId: "0x1", scannerId: "0x2", txHash: TX_HASH },
    { action: "Unlink", agentId: "0x1", scannerId: "0x2", txHash: TX_HASH },
  ];

  it("should route every action to the handler of its kind", async () => {
    const calls: string[] = [];
    const handlers: RegistryHandlers = {
      saveAgent: (message) => void calls.push(`saveAgent:${message.action}`),
      agentAction: (message) => void calls.push(`agentAction:${message.action}`),
      saveScanner: (message) => void calls.push(`saveScanner:${message.action}`),
      scannerAction: (message) => void calls.push(`scannerAction:${message.action}`),
      dispatch: async (message) => void calls.push(`dispatch:${message.action}`),
    };

    for (const message of messages) {
      expect(await dispatchMessage(message, handlers, context)).toBe(true);
    }

    expect(calls).toEqual([
      "saveAgent:SaveAgent",
      "agentAction:EnableAgent",
      "agentAction:DisableAgent",
      "saveScanner:SaveScanner",
      "scannerAction:EnableScanner",
      "scannerAction:DisableScanner",
      "dispatch:Link",
      "dispatch:Unlink",
    ]);
  });

  it("should pass the message and context through", async () => {
    const dispatch = vi.fn();
    const message = messages[6];

    await dispatchMessage(message, { dispatch }, context);

    expect(dispatch).toHaveBeenCalledWith(message, context);
  });

  it("should drop messages without a handler", async () => {
    for (const message of messages) {
      expect(await dispatchMessage(message, {}, context)).toBe(false);
    }
  });

  it("should propagate handler errors", async () => {
    const error = new Error("handler failed");

    await expect(
      dispatchMessage(messages[1], { agentAction: () => Promise.reject(error) }, context)
    ).rejects.toBe(error);
  });
});
