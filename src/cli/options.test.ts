import { describe, it, expect } from "vitest";
import { ConfigError } from "../lib/errors";
import { parseCliOptions } from "./options";

function configErrorFrom(argv: string[]): ConfigError {
  try {
    parseCliOptions(argv);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("expected ConfigError");
}

describe("parseCliOptions", () => {
  it("should return no overrides without flags", () => {
    expect(parseCliOptions([])).toEqual({});
  });

  it("should return null for --help", () => {
    expect(parseCliOptions(["-h"])).toBeNull();
  });

  it("should map flags onto config overrides", () => {
    expect(
      parseCliOptions([
        "--ports",
        "9000,9003",
        "--port-hands",
        "9000=left,9003=right",
        "--sample-rate",
        "30",
        "--export-orientation",
        "--no-orientation-calibration",
        "--log-level",
        "DEBUG",
      ]),
    ).toEqual({
      ports: [9000, 9003],
      portHands: { "9000": "left", "9003": "right" },
      sampleRateHz: 30,
      includeOrientationInExport: true,
      calibrateOrientation: false,
      logLevel: "debug",
    });
  });

  it("should report an unknown flag as a ConfigError", () => {
    const error = configErrorFrom(["--bogus"]);

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^Unknown option '--bogus'/);
  });

  it("should report a flag missing its value as a ConfigError", () => {
    expect(() => parseCliOptions(["--ports"])).toThrow(ConfigError);
  });

  it("should report an unknown log level", () => {
    expect(configErrorFrom(["--log-level", "loud"]).issues).toEqual([
      '--log-level: unknown level "loud"',
    ]);
  });
});
