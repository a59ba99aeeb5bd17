import { describe, it, expect } from "vitest";
import { createLogger, createChildLogger, createSilentLogger } from "./logger.js";

describe("createLogger", () => {
  it("uses the given level and service name", () => {
    const logger = createLogger({ level: "warn", service: "ingest", pretty: false });
    expect(logger.level).toBe("warn");
    expect(logger.bindings()).toMatchObject({ name: "ingest" });
  });

  it("child loggers inherit the level and add bindings", () => {
    const parent = createLogger({ level: "error", pretty: false });
    const child = createChildLogger(parent, { documentId: "doc-1" });
    expect(child.level).toBe("error");
    expect(child.bindings()).toMatchObject({ documentId: "doc-1" });
  });

  it("silent logger drops everything", () => {
    expect(createSilentLogger().level).toBe("silent");
  });
});
