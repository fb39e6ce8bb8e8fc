import "../setup";
import { createLogger, isLogLevel, type LogMeta } from "../../src/utils/logger";

describe("logger", () => {
  function capture(level: Parameters<typeof createLogger>[0] = {}) {
    const seen: Array<{ meta: LogMeta; message: string; fields?: Record<string, unknown> }> = [];
    const log = createLogger({ ...level, sink: (meta, message, fields) => seen.push({ meta, message, fields }) });
    return { log, seen };
  }

  it("drops messages below the level", () => {
    const { log, seen } = capture({ level: "warn" });
    log.info("hidden");
    log.warn("shown", { id: 1 });
    log.error("also shown");
    expect(seen.map((s) => [s.meta.level, s.message, s.fields])).toEqual([
      ["warn", "shown", { id: 1 }],
      ["error", "also shown", undefined]
    ]);
  });

  it("emits nothing when silent", () => {
    const { log, seen } = capture({ level: "silent" });
    log.error("nope");
    expect(seen).toEqual([]);
  });

  it("nests scopes in children", () => {
    const { log, seen } = capture({ level: "trace", scope: ["vault"] });
    log.child("keys").child("rekey").debug("step");
    expect(seen[0]?.meta.scope).toEqual(["vault", "keys", "rekey"]);
    expect(log.child("x").level).toBe("trace");
  });

  it("reads its default level from the environment", () => {
    const previous = process.env.VAULT_LOG_LEVEL;
    try {
      process.env.VAULT_LOG_LEVEL = "debug";
      expect(createLogger().level).toBe("debug");
      process.env.VAULT_LOG_LEVEL = "loud";
      expect(createLogger().level).toBe("warn");
    } finally {
      if (previous === undefined) delete process.env.VAULT_LOG_LEVEL;
      else process.env.VAULT_LOG_LEVEL = previous;
    }
  });

  it("validates level names", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
