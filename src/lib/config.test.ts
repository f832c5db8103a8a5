import { describe, it, expect } from "vitest";
import {
  DEFAULT_PORTS,
  configFromEnv,
  defaultConfig,
  loadConfig,
  parseConfig,
} from "./config";
import { ConfigError } from "./errors";

describe("config", () => {
  it("should provide defaults", () => {
    expect(defaultConfig()).toEqual({
      host: "0.0.0.0",
      ports: DEFAULT_PORTS,
      portHands: {},
      sampleRateHz: 60,
      calibrateOrientation: true,
      includeOrientationInExport: false,
      exportDir: "exports",
      statusIntervalMs: 1000,
      logLevel: "info",
    });
    expect(DEFAULT_PORTS).toEqual([9000, 9001, 9002, 9003, 9004, 9005]);
  });

  it("should name every invalid field", () => {
    try {
      parseConfig({ ports: [9000, 9000], sampleRateHz: 0, extra: true });
      expect.unreachable("parseConfig should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues).toHaveLength(3);
      expect(issues).toContain("ports: ports must be unique");
      expect(issues.some((i) => i.startsWith("sampleRateHz:"))).toBe(true);
      expect(issues.some((i) => i.startsWith("(root):"))).toBe(true);
    }
  });

  it("should reject ports outside 1-65535", () => {
    expect(() => parseConfig({ ports: [70000] })).toThrow(ConfigError);
  });

  it("should read GLOVE_* variables", () => {
    const input = configFromEnv({
      GLOVE_HOST: "127.0.0.1",
      GLOVE_PORTS: "9100, 9101",
      GLOVE_PORT_HANDS: "9100=LEFT,9101=right",
      GLOVE_SAMPLE_RATE: "120",
      GLOVE_CALIBRATE_ORIENTATION: "off",
      GLOVE_EXPORT_ORIENTATION: "yes",
      GLOVE_EXPORT_DIR: "/tmp/out",
      GLOVE_LOG_LEVEL: "DEBUG",
    });

    expect(input).toEqual({
      host: "127.0.0.1",
      ports: [9100, 9101],
      portHands: { "9100": "left", "9101": "right" },
      sampleRateHz: 120,
      calibrateOrientation: false,
      includeOrientationInExport: true,
      exportDir: "/tmp/out",
      logLevel: "debug",
    });
  });

  it("should leave unset variables out", () => {
    expect(configFromEnv({})).toEqual({});
  });

  it("should reject unparseable variables", () => {
    expect(() =>
      configFromEnv({ GLOVE_SAMPLE_RATE: "fast", GLOVE_PORT_HANDS: "9000=up" }),
    ).toThrow(
      'Invalid configuration: GLOVE_PORT_HANDS: expected <port>=left|right, got "9000=up"; ' +
        'GLOVE_SAMPLE_RATE: expected a number, got "fast"',
    );
  });

  it("should let overrides win over the environment", () => {
    const config = loadConfig(
      { sampleRateHz: 30 },
      { GLOVE_SAMPLE_RATE: "90", GLOVE_EXPORT_DIR: "clips" },
    );

    expect(config.sampleRateHz).toBe(30);
    expect(config.exportDir).toBe("clips");
  });
});
