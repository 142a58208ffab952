import { describe, it, expect, afterEach } from "vitest";
import { createMockLogger } from "@chainfeed/testing";
import { HealthServer } from "./HealthServer.ts";
import type { HealthReport } from "./types.ts";

describe("HealthServer", () => {
  let server: HealthServer | null = null;

  afterEach(async () => {
    await server?.stop();
    server = null;
  });

  it("should serve the checker reports on /health", async () => {
    const reports: HealthReport[] = [{ name: "service.block-feed", status: "ok", details: "" }];
    server = new HealthServer({ checker: () => reports, logger: createMockLogger() });

    const response = await server.build().inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(reports);
  });

  it("should serve an empty array without reports", async () => {
    server = new HealthServer({ checker: () => [], logger: createMockLogger() });

    const response = await server.build().inject({ method: "GET", url: "/health" });

    expect(response.body).toBe("[]");
  });

  it("should return 404 for other routes", async () => {
    server = new HealthServer({ checker: () => [], logger: createMockLogger() });

    const response = await server.build().inject({ method: "GET", url: "/status" });

    expect(response.statusCode).toBe(404);
  });

  it("should reuse the built instance", () => {
    server = new HealthServer({ checker: () => [], logger: createMockLogger() });

    expect(server.build()).toBe(server.build());
    expect(server.getInstance()).toBe(server.build());
  });
});
