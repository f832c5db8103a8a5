/**
 * Engine configuration.
 *
 * Sources, later wins: defaults → environment (GLOVE_*) → command-line flags.
 * Everything is validated by one zod schema; invalid input throws ConfigError
 * naming each offending field.
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import { LOG_LEVELS, isLogLevel } from "./logger";
import type { Hand } from "./hand/joints";

export const DEFAULT_PORTS = [9000, 9001, 9002, 9003, 9004, 9005];

const portSchema = z.number().int().min(1).max(65535);
const handSchema = z.enum(["left", "right"]);
const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const configSchema = z
  .object({
    host: z.string().min(1).default("0.0.0.0"),
    ports: z
      .array(portSchema)
      .min(1)
      .refine((ports) => new Set(ports).size === ports.length, {
        message: "ports must be unique",
      })
      .default(DEFAULT_PORTS),
    /** Hand for addresses that carry none (/joint/<index>), by port */
    portHands: z.record(z.string().regex(/^\d+$/), handSchema).default({}),
    sampleRateHz: z.number().positive().max(1000).default(60),
    calibrateOrientation: z.boolean().default(true),
    includeOrientationInExport: z.boolean().default(false),
    exportDir: z.string().min(1).default("exports"),
    statusIntervalMs: z.number().int().min(0).default(1000),
    logLevel: logLevelSchema.default("info"),
  })
  .strict();

export type GloveConfig = z.infer<typeof configSchema>;
export type GloveConfigInput = z.input<typeof configSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

export function parseConfig(input: unknown): GloveConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

export function defaultConfig(): GloveConfig {
  return parseConfig({});
}

function parseNumber(raw: string, name: string, issues: string[]): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    issues.push(`${name}: expected a number, got "${raw}"`);
  }
  return value;
}

/** "9000,9001,9002" */
export function parsePortList(raw: string, name: string, issues: string[]): number[] {
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => parseNumber(part, name, issues));
}

/** "9000=left,9003=right" */
export function parsePortHands(
  raw: string,
  name: string,
  issues: string[],
): Record<string, Hand> {
  const out: Record<string, Hand> = {};
  for (const entry of raw.split(",").map((e) => e.trim()).filter(Boolean)) {
    const [port, hand] = entry.split("=").map((s) => s.trim().toLowerCase());
    const parsed = handSchema.safeParse(hand);
    if (!port || !parsed.success) {
      issues.push(`${name}: expected <port>=left|right, got "${entry}"`);
      continue;
    }
    out[port] = parsed.data;
  }
  return out;
}

function parseBoolean(raw: string, name: string, issues: string[]): boolean {
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  issues.push(`${name}: expected a boolean, got "${raw}"`);
  return false;
}

/**
 * Map GLOVE_* variables onto config fields. Unset variables are left out so
 * defaults still apply.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): GloveConfigInput {
  const issues: string[] = [];
  const input: GloveConfigInput = {};

  if (env.GLOVE_HOST) input.host = env.GLOVE_HOST;
  if (env.GLOVE_PORTS) {
    input.ports = parsePortList(env.GLOVE_PORTS, "GLOVE_PORTS", issues);
  }
  if (env.GLOVE_PORT_HANDS) {
    input.portHands = parsePortHands(
      env.GLOVE_PORT_HANDS,
      "GLOVE_PORT_HANDS",
      issues,
    );
  }
  if (env.GLOVE_SAMPLE_RATE) {
    input.sampleRateHz = parseNumber(
      env.GLOVE_SAMPLE_RATE,
      "GLOVE_SAMPLE_RATE",
      issues,
    );
  }
  if (env.GLOVE_CALIBRATE_ORIENTATION) {
    input.calibrateOrientation = parseBoolean(
      env.GLOVE_CALIBRATE_ORIENTATION,
      "GLOVE_CALIBRATE_ORIENTATION",
      issues,
    );
  }
  if (env.GLOVE_EXPORT_ORIENTATION) {
    input.includeOrientationInExport = parseBoolean(
      env.GLOVE_EXPORT_ORIENTATION,
      "GLOVE_EXPORT_ORIENTATION",
      issues,
    );
  }
  if (env.GLOVE_EXPORT_DIR) input.exportDir = env.GLOVE_EXPORT_DIR;
  if (env.GLOVE_LOG_LEVEL) {
    const level = env.GLOVE_LOG_LEVEL.toLowerCase();
    if (isLogLevel(level)) {
      input.logLevel = level;
    } else {
      issues.push(`GLOVE_LOG_LEVEL: expected one of ${LOG_LEVELS.join("|")}`);
    }
  }

  if (issues.length > 0) throw new ConfigError(issues);
  return input;
}

/**
 * Resolve the effective configuration from environment plus overrides.
 */
export function loadConfig(
  overrides: GloveConfigInput = {},
  env: Record<string, string | undefined> = process.env,
): GloveConfig {
  return parseConfig({ ...configFromEnv(env), ...overrides });
}
