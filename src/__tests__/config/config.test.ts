import { afterEach, describe, expect, it } from "vitest";
import { type ConfigInput, configure, getConfig, resetConfig } from "../../config/config.js";
import { consoleLogger, isLogger, silentLogger } from "../../config/logger.js";
import { ConfigError } from "../../errors/errors.js";

afterEach(() => {
  resetConfig();
});

describe("configure()", () => {
  it("starts from the defaults", () => {
    expect(getConfig()).toEqual({
      timestamps: true,
      logger: consoleLogger,
      storeDatetimeAsString: false,
      storeDateAsString: false,
      storeBooleanAsNative: true,
      inheritanceField: "type",
      namespace: "",
    });
  });

  it("merges settings into the current configuration", () => {
    configure({ timestamps: false });
    configure({ namespace: "dev_" });
    expect(getConfig().timestamps).toBe(false);
    expect(getConfig().namespace).toBe("dev_");
  });

  it("restores the defaults on resetConfig()", () => {
    configure({ logger: silentLogger, inheritanceField: "kind" });
    resetConfig();
    expect(getConfig().logger).toBe(consoleLogger);
    expect(getConfig().inheritanceField).toBe("type");
  });

  it("rejects settings of the wrong shape with their paths", () => {
    try {
      configure({ inheritanceField: "" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.type).toBe("config");
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]?.path).toBe("inheritanceField");
        expect(error.message.startsWith("Invalid configuration: inheritanceField: ")).toBe(true);
      }
    }
    expect(getConfig().inheritanceField).toBe("type");
  });

  it("rejects unknown settings", () => {
    const input: ConfigInput = JSON.parse('{"retries":3}');
    expect(() => configure(input)).toThrow("Invalid configuration");
  });

  it("rejects loggers missing a method", () => {
    const logger = { debug: () => undefined, info: () => undefined, warn: () => undefined };
    expect(isLogger(logger)).toBe(false);
    expect(isLogger(silentLogger)).toBe(true);
  });
});
