/**
 * Command-line flags for the terminal front end.
 */

import { parseArgs } from "node:util";
import {
  parsePortHands,
  parsePortList,
  type GloveConfigInput,
} from "../lib/config";
import { ConfigError, describeError } from "../lib/errors";
import { isLogLevel } from "../lib/logger";

export const USAGE = `Usage: glove-telemetry [options]

Options:
  --host <addr>              Bind address (default 0.0.0.0)
  --ports <list>             Comma-separated UDP ports (default 9000-9005)
  --port-hands <map>         Hand for /joint/<n> addresses, e.g. 9000=left,9003=right
  --sample-rate <hz>         Recorder sample rate (default 60)
  --export-dir <dir>         Output directory for CSV / JSON (default exports)
  --export-orientation       Include quaternion columns in CSV exports
  --no-orientation-calibration
                             Offset positions only when calibrating
  --status-interval <ms>     Status line period, 0 disables (default 1000)
  --log-level <level>        debug | info | warn | error
  -h, --help                 Show this help`;

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        host: { type: "string" },
        ports: { type: "string" },
        "port-hands": { type: "string" },
        "sample-rate": { type: "string" },
        "export-dir": { type: "string" },
        "export-orientation": { type: "boolean" },
        "no-orientation-calibration": { type: "boolean" },
        "status-interval": { type: "string" },
        "log-level": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
    });
  } catch (error) {
    // Unknown flags and missing flag values
    throw new ConfigError([describeError(error)]);
  }
}

/**
 * Config overrides from command-line flags, or null when help was asked for.
 * @throws ConfigError for unknown flags or bad values
 */
export function parseCliOptions(argv: string[]): GloveConfigInput | null {
  const { values } = parseFlags(argv);

  if (values.help) return null;

  const issues: string[] = [];
  const overrides: GloveConfigInput = {};

  if (values.host !== undefined) overrides.host = values.host;
  if (values.ports !== undefined) {
    overrides.ports = parsePortList(values.ports, "--ports", issues);
  }
  if (values["port-hands"] !== undefined) {
    overrides.portHands = parsePortHands(
      values["port-hands"],
      "--port-hands",
      issues,
    );
  }
  if (values["sample-rate"] !== undefined) {
    overrides.sampleRateHz = Number(values["sample-rate"]);
  }
  if (values["export-dir"] !== undefined) {
    overrides.exportDir = values["export-dir"];
  }
  if (values["export-orientation"]) overrides.includeOrientationInExport = true;
  if (values["no-orientation-calibration"]) {
    overrides.calibrateOrientation = false;
  }
  if (values["status-interval"] !== undefined) {
    overrides.statusIntervalMs = Number(values["status-interval"]);
  }
  if (values["log-level"] !== undefined) {
    const level = values["log-level"].toLowerCase();
    if (isLogLevel(level)) {
      overrides.logLevel = level;
    } else {
      issues.push(`--log-level: unknown level "${values["log-level"]}"`);
    }
  }

  if (issues.length > 0) throw new ConfigError(issues);
  return overrides;
}
