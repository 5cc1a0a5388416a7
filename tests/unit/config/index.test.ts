/**
 * Unit tests for config loading.
 */

import { loadConfig, parseWebhooks } from "../../../src/config";

describe("loadConfig", () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it("returns positive loop and server limits", () => {
    const config = loadConfig();
    // Avoid asserting exact defaults because loadConfig reads from process.env/.env.local.
    expect(config.agent.maxIterations).toBeGreaterThan(0);
    expect(config.server.heartbeatIntervalMs).toBeGreaterThan(0);
    expect(config.memory.consolidateEvery).toBeGreaterThan(0);
  });

  it("reads overrides from the environment", () => {
    process.env.MODEL_PROVIDER = "stub";
    process.env.MAX_TOOL_ITERATIONS = "7";
    process.env.HEARTBEAT_INTERVAL_MS = "250";
    process.env.CONSOLIDATE_EVERY = "not-a-number";
    process.env.FEISHU_APP_ID = "test-app";
    process.env.FEISHU_APP_SECRET = "test-secret";
    const config = loadConfig();
    expect(config.llm.provider).toBe("stub");
    expect(config.agent.maxIterations).toBe(7);
    expect(config.server.heartbeatIntervalMs).toBe(250);
    expect(config.memory.consolidateEvery).toBe(10);
    expect(config.channels.feishu).toEqual({ appId: "test-app", appSecret: "test-secret" });
  });
});

describe("parseWebhooks", () => {
  it("parses channel=url pairs and skips malformed ones", () => {
    expect(parseWebhooks("ops=https://hooks.test/ops, bad, =https://x, alerts=https://hooks.test/a=1")).toEqual({
      ops: "https://hooks.test/ops",
      alerts: "https://hooks.test/a=1",
    });
    expect(parseWebhooks(undefined)).toEqual({});
  });
});
