/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for TwitchTuner.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue } from "./config/userConfig.js";
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import { type StartupOptions, startServer } from "./app.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import { initializeDataDir } from "./config/paths.js";
import path from "node:path";

/* These handlers catch unhandled promise rejections and uncaught exceptions to prevent the process from crashing. For a livestreaming server, process stability is
 * critical - a single unhandled error should not end every viewer session and recording. The handlers log the error and allow the process to continue. Failures
 * inside a session or a recorder are handled where they happen.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/* The entry point supports basic command-line arguments for common operations like changing the port, showing help, and displaying the version.
 */

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: twitchtuner [options]");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file (for Docker or debugging)");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -p, --port <port>               Set server port (default: 5000)");
  console.log("  -v, --version                   Show version number");
  console.log("  --data-dir <path>               Set data directory (default: ~/.twitchtuner)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --log-file <path>               Set log file path (default: <data-dir>/twitchtuner.log)");
  console.log("");
  console.log("Common Environment Variables:");
  console.log("  BASE_URL                        Public base URL used in lineups and playlists");
  console.log("  CLIENT_ID                       Twitch application client ID");
  console.log("  CLIENT_SECRET                   Twitch application client secret");
  console.log("  EXTRACTION_MODE                 direct (default) or discover");
  console.log("  PORT                            HTTP server port");
  console.log("  RECORDING_PATH                  Recordings directory (default: <data-dir>/recordings)");
  console.log("  STREAM_QUALITY                  Stream quality, comma separated in order of preference");
  console.log("  SUBSCRIPTIONS_PATH              Subscriptions file (default: <data-dir>/channels.json)");
  console.log("  TWITCHTUNER_DATA_DIR            Data directory path (default: ~/.twitchtuner)");
  console.log("  TWITCHTUNER_DEBUG               Debug category filter (e.g., 'recording', '*,-pipeline:stderr')");
  console.log("");
  console.log("  Run 'twitchtuner --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints a complete listing of all environment variables organized by category. Generated from CONFIG_METADATA so it is always accurate.
 */
function printEnvironmentVariables(): void {

  /* eslint-disable no-console */

  // Category ordering: server first (most commonly configured), then alphabetical.
  const categoryOrder: { displayName: string; key: string }[] = [
    { displayName: "Server", key: "server" },
    { displayName: "HDHomeRun", key: "hdhr" },
    { displayName: "Logging", key: "logging" },
    { displayName: "Paths", key: "paths" },
    { displayName: "Recording", key: "recording" },
    { displayName: "Streaming", key: "streaming" },
    { displayName: "Twitch", key: "twitch" }
  ];

  // Defaults for null settings that resolve at runtime rather than from DEFAULTS.
  const dynamicDefaults: Record<string, string> = {

    "paths.logFile": "<data-dir>/twitchtuner.log",
    "recording.path": "<data-dir>/recordings",
    "server.baseUrl": "(derived from each request)",
    "twitch.channelsFile": "<data-dir>/channels.json"
  };

  console.log("TwitchTuner Environment Variables");
  console.log("");
  console.log("All settings can also be configured in config.json in the data directory.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    const settings = CONFIG_METADATA[category.key];

    console.log("");
    console.log(category.displayName + ":");

    let first = true;

    for(const setting of settings) {

      const envVar = setting.envVar;

      if(!envVar) {

        continue;
      }

      if(!first) {

        console.log("");
      }

      first = false;

      console.log("  " + envVar);

      // Only the first sentence of the description.
      const desc = setting.description;
      const periodSpace = desc.indexOf(". ");

      console.log("    " + ((periodSpace !== -1) ? desc.slice(0, periodSpace + 1) : desc));

      const dynamicDefault = dynamicDefaults[setting.path];
      let defaultStr: string;

      if(dynamicDefault) {

        defaultStr = dynamicDefault;
      } else {

        const defaultValue = getNestedValue(DEFAULTS, setting.path);

        defaultStr = (defaultValue === "") ? "(empty)" : String(defaultValue);

        if((typeof defaultValue === "number") && setting.unit) {

          defaultStr = defaultStr + " (" + setting.unit + ")";
        }
      }

      console.log("    Default: " + defaultStr);
    }
  }

  // Special environment variables that are not part of CONFIG_METADATA. TWITCHTUNER_DATA_DIR is resolved before config.json is loaded, so it cannot be in
  // config.json. TWITCHTUNER_DEBUG is a runtime-only setting parsed in the entry point.
  console.log("");
  console.log("Special:");
  console.log("  TWITCHTUNER_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.twitchtuner");
  console.log("");
  console.log("  TWITCHTUNER_DEBUG");
  console.log("    Debug category filter. Known categories: " + DEBUG_CATEGORIES.map((entry) => entry.category).join(", ") + ".");
  console.log("    Default: (disabled)");

  /* eslint-enable no-console */
}

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs extends StartupOptions {

  dataDir?: string;
  debugLogging: boolean;
}

/**
 * Validates that a path argument is absolute. Prints an error and exits if relative.
 * @param flag - The CLI flag name for the error message.
 * @param value - The path value to validate. Undefined when the flag is the last argument.
 * @returns The validated path.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  if(!value) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires a path argument.");

    process.exit(1);
  }

  if(!path.isAbsolute(value)) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires an absolute path, got: " + value);

    process.exit(1);
  }

  return value;
}

/**
 * Parses command-line arguments into a structured result. Values are stored in ParsedArgs rather than written directly to CONFIG, so that the configuration merge
 * system can apply CLI overrides at the correct priority level (CLI > env > config.json > defaults).
 * @param args - Arguments after the script name.
 * @returns Parsed argument flags and values.
 */
function parseArgs(args: readonly string[]): ParsedArgs {

  const parsed: ParsedArgs = { consoleLogging: false, debugLogging: false };

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    switch(arg) {

      case "-c":
      case "--console":

        parsed.consoleLogging = true;

        break;

      case "-d":
      case "--debug":

        parsed.debugLogging = true;

        break;

      case "-h":
      case "--help":

        printUsage();

        process.exit(0);

      case "-p":
      case "--port": {

        const port = parseInt(args[++i]);

        if(isNaN(port)) {

          // eslint-disable-next-line no-console
          console.error("Error: " + arg + " requires a numeric port.");

          process.exit(1);
        }

        parsed.port = port;

        break;
      }

      case "-v":
      case "--version":

        // eslint-disable-next-line no-console
        console.log("TwitchTuner v" + getPackageVersion());

        process.exit(0);

      case "--data-dir":

        parsed.dataDir = requireAbsolutePath(arg, args[++i]);

        break;

      case "--log-file":

        parsed.logFile = requireAbsolutePath(arg, args[++i]);

        break;

      default:

        break;
    }
  }

  return parsed;
}

const rawArgs = process.argv.slice(2);

// Initialize the data directory early from the environment variable or the default. parseArgs() may override this with the --data-dir flag below.
initializeDataDir();

if(rawArgs.includes("--list-env")) {

  printEnvironmentVariables();

  process.exit(0);
}

/* The main entry point parses command-line arguments, starts the server, and handles any fatal errors that occur during initialization. If startup fails, we exit
 * with a non-zero code to signal the failure to process managers.
 */

const parsedArgs = parseArgs(rawArgs);

if(parsedArgs.dataDir) {

  initializeDataDir(parsedArgs.dataDir);
}

// Enable debug logging before starting the server so debug messages during startup are captured. The TWITCHTUNER_DEBUG environment variable takes precedence over
// the --debug CLI flag, allowing fine-grained category selection.
const debugEnv = process.env.TWITCHTUNER_DEBUG;

if(debugEnv) {

  initDebugFilter(debugEnv);
} else if(parsedArgs.debugLogging) {

  setDebugLogging(true);
}

/* Safety net for exit paths that bypass graceful shutdown, such as process.exit(1) after a fatal startup error. The 'exit' event runs synchronously, so buffered log
 * entries are flushed with a synchronous write. Child processes see their pipes close when we exit.
 */
process.on("exit", (): void => {

  flushLogBufferSync();
});

startServer(parsedArgs).catch((error: unknown): void => {

  LOG.error("Fatal startup error occurred: %s.", formatError(error));

  process.exit(1);
});
