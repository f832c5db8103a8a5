/**
 * Terminal front end: starts the engine, prints a status line and maps
 * command keys read from stdin onto engine commands.
 *
 *   tsx src/main.ts --ports 9000,9001 --sample-rate 60 --export-dir exports
 */

import * as readline from "node:readline";
import {
  COMMAND_HELP,
  formatStatusLine,
  parseCommand,
  type TerminalCommand,
} from "./cli/commandKeys";
import { USAGE, parseCliOptions } from "./cli/options";
import { GloveEngine } from "./engine/GloveEngine";
import { loadConfig } from "./lib/config";
import {
  BindError,
  ConfigError,
  EmptyRecordingError,
  ExportError,
  GloveError,
  describeError,
} from "./lib/errors";
import { log } from "./lib/logger";

async function runCommand(
  engine: GloveEngine,
  command: TerminalCommand,
): Promise<boolean> {
  switch (command.kind) {
    case "recalibrate": {
      if (!engine.jointState.hasData()) {
        log.warn("No hand data yet; baseline is the identity pose");
      }
      engine.recalibrate();
      console.log("Calibrated: current pose is now zero");
      return true;
    }
    case "toggleRecording":
      if (engine.status().recorder === "recording") {
        const frames = engine.stopRecording();
        console.log(`Recording stopped: ${frames} frames`);
      } else {
        engine.startRecording();
        console.log("Recording...");
      }
      return true;
    case "togglePlayback":
      if (engine.status().playback === "playing") {
        engine.stopPlayback();
        console.log("Playback stopped");
      } else {
        engine.startPlayback();
        console.log("Playback started (looping)");
      }
      return true;
    case "exportSnapshot": {
      const file = await engine.saveSnapshot();
      console.log(`Saved ${file}`);
      return true;
    }
    case "saveRecording": {
      const paths = await engine.saveRecording();
      console.log(`Saved ${paths.csv}\nSaved ${paths.json}`);
      return true;
    }
    case "loadRecording": {
      const recording = await engine.loadRecording(command.path);
      console.log(
        `Loaded ${recording.frameCount} frames; press p to play`,
      );
      return true;
    }
    case "help":
      console.log(COMMAND_HELP);
      return true;
    case "quit":
      return false;
  }
}

function reportCommandError(error: unknown): void {
  if (error instanceof EmptyRecordingError || error instanceof ExportError) {
    console.error(error.message);
  } else if (error instanceof GloveError) {
    log.error(error.message);
  } else {
    log.error("Command failed", error);
  }
}

async function main(): Promise<number> {
  const overrides = parseCliOptions(process.argv.slice(2));
  if (overrides === null) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(overrides);
  const engine = new GloveEngine({ config });

  try {
    await engine.start();
  } catch (error) {
    if (error instanceof BindError) {
      console.error(
        `${error.message}: ${describeError(error.cause)}. Is another listener running?`,
      );
      return 1;
    }
    throw error;
  }

  console.log(COMMAND_HELP);

  const statusTimer =
    config.statusIntervalMs > 0
      ? setInterval(() => {
          console.log(formatStatusLine(engine.status()));
        }, config.statusIntervalMs)
      : null;

  const rl = readline.createInterface({ input: process.stdin });

  await new Promise<void>((resolve) => {
    let queue = Promise.resolve();

    rl.on("line", (line) => {
      const parsed = parseCommand(line);
      if (!parsed) return;
      if (!parsed.ok) {
        console.log(parsed.message);
        return;
      }
      // Commands run one at a time in input order
      queue = queue.then(async () => {
        try {
          const keepRunning = await runCommand(engine, parsed.command);
          if (!keepRunning) rl.close();
        } catch (error) {
          reportCommandError(error);
        }
      });
    });
    rl.on("close", () => resolve());
    process.once("SIGINT", () => rl.close());
  });

  if (statusTimer) clearInterval(statusTimer);
  await engine.stop();
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error(USAGE);
    } else {
      log.error("Fatal", error);
    }
    process.exitCode = 1;
  },
);
