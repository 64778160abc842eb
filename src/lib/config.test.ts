import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { isDiagramServiceAvailable, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      host: "0.0.0.0",
      port: 8000,
      logLevel: "info",
      openaiApiKey: undefined,
      openaiModel: "gpt-4o-mini",
      openaiTimeoutMs: 60000,
      openaiMaxRetries: 3,
      tempDir: path.join(os.tmpdir(), "arch-diagrams"),
      diagramDirection: "right",
      renderTimeoutMs: 30000,
      minDescriptionLength: 10,
    });
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      HOST: "127.0.0.1",
      PORT: "9100",
      LOG_LEVEL: "warning",
      OPENAI_API_KEY: " test-key ",
      OPENAI_MAX_RETRIES: "0",
      DIAGRAM_TEMP_DIR: "/tmp/diagrams",
      DIAGRAM_DIRECTION: "down",
    });

    expect(config.host).toBe("127.0.0.1");
    expect(config.port).toBe(9100);
    expect(config.logLevel).toBe("warn");
    expect(config.openaiApiKey).toBe("test-key");
    expect(config.openaiMaxRetries).toBe(0);
    expect(config.tempDir).toBe(path.resolve("/tmp/diagrams"));
    expect(config.diagramDirection).toBe("down");
    expect(isDiagramServiceAvailable(config)).toBe(true);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "   ", PORT: "" });
    expect(config.port).toBe(8000);
    expect(isDiagramServiceAvailable(config)).toBe(false);
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow();
  });

  it("rejects an unknown layout direction", () => {
    expect(() => loadConfig({ DIAGRAM_DIRECTION: "sideways" })).toThrow();
  });
});
