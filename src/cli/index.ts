import { loadConfig, type AppConfig } from "../config";
import { runDownload, runLastChange, runList, type CommandContext } from "../core/commands";
import { InvalidFunctionArgumentError, UnknownSchemeIdError } from "../core/errors";
import type { FetchFn } from "../core/fetch";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { formatExtractResult, formatLocalTimestamp, formatSchemeListing, formatVersionReport } from "./report";

export type FunctionName = "last_change" | "download";

export type CliCommand =
  | { kind: "list" }
  | { kind: "missing_function"; schemeId: string }
  | { kind: "missing_id"; functionName: string }
  | { kind: "run"; functionName: FunctionName; schemeId: string };

export interface ParsedCliArgs {
  readonly command: CliCommand;
  readonly configPath?: string;
  readonly outputDir?: string;
  readonly ignoreHttpsErrors: boolean;
}

export interface CliIo {
  write?: (line: string) => void;
  fetchFn?: FetchFn;
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
}

const HELP_TEXT = `
Usage:
  cgmlst-schemes [options]

Without -f and -i the available cgMLST.org schemes are listed with their scheme_ID.

Options:
  -f, --function <name>  Function to perform:
                           last_change  show version and time of the last change of the scheme
                           download     download and unzip the allele archive of the scheme
  -i, --id <scheme_ID>   Scheme on which to perform the function
  --output-dir <path>    Directory receiving downloaded archives (default: current directory)
  --config <path>        Optional path to JSON config file
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

const INVALID_FUNCTION_MESSAGE = '\nInvalid entry for -f. Please specify "-f last_change", or "-f download".';

function isFunctionName(value: string): value is FunctionName {
  return value === "last_change" || value === "download";
}

function readOption(argv: readonly string[], ...names: string[]): string | undefined {
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (names.includes(arg)) {
      const value = argv[index + 1];
      return value !== undefined && !value.startsWith("-") ? value : undefined;
    }
    const long = names.find((name) => name.startsWith("--") && arg.startsWith(`${name}=`));
    if (long) {
      return arg.slice(long.length + 1) || undefined;
    }
  }
  return undefined;
}

/**
 * Turns argv into a single command descriptor. Throws
 * InvalidFunctionArgumentError when both -f and -i are given and -f is unknown.
 */
export function parseCliArgs(argv: readonly string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const functionName = readOption(argv, "-f", "--function");
  const schemeId = readOption(argv, "-i", "--id");

  let command: CliCommand;
  if (functionName === undefined) {
    command = schemeId === undefined ? { kind: "list" } : { kind: "missing_function", schemeId };
  } else if (schemeId === undefined) {
    command = { kind: "missing_id", functionName };
  } else if (isFunctionName(functionName)) {
    command = { kind: "run", functionName, schemeId };
  } else {
    throw new InvalidFunctionArgumentError(functionName);
  }

  return {
    command,
    configPath: readOption(argv, "--config"),
    outputDir: readOption(argv, "--output-dir"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    outputDir: parsed.outputDir ?? config.outputDir,
  };
}

export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  const write = io.write ?? ((line: string) => console.log(line));
  const now = io.now ?? (() => new Date());

  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof InvalidFunctionArgumentError) {
      write(INVALID_FUNCTION_MESSAGE);
      return 1;
    }
    throw error;
  }

  if (parsed === "help") {
    write(HELP_TEXT.trim());
    return 0;
  }

  const { command } = parsed;
  if (command.kind === "missing_function") {
    write("\nPlease provide function you want to perform using argument -f.");
    return 0;
  }
  if (command.kind === "missing_id") {
    write("\nPlease provide scheme_ID using argument -i");
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath, io.env), parsed);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, level: config.logLevel });
  const context: CommandContext = { runId, config, logger, metrics, fetchFn: io.fetchFn };

  logger.info("command_start", {
    command: command.kind === "run" ? command.functionName : command.kind,
    schemeId: command.kind === "run" ? command.schemeId : undefined,
    outputDir: config.outputDir,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    if (command.kind === "list") {
      write(`\nCurrent date and time:  ${formatLocalTimestamp(now())}`);
      write("\nPrinting available cgMLST.org schemes with their IDs:\n");
      const schemes = await runList({ ...context, logger: logger.child("list") });
      formatSchemeListing(schemes).forEach((line) => write(line));
      return 0;
    }

    try {
      switch (command.functionName) {
        case "last_change": {
          const info = await runLastChange({ ...context, logger: logger.child("last_change") }, command.schemeId);
          formatVersionReport(info).forEach((line) => write(line));
          break;
        }
        case "download": {
          const result = await runDownload({ ...context, logger: logger.child("download") }, command.schemeId);
          formatExtractResult(result).forEach((line) => write(line));
          break;
        }
      }
    } catch (error) {
      if (error instanceof UnknownSchemeIdError) {
        write("\nInvalid entry for -i. Please specify one of the existing scheme_ID.");
        write("\nAvailable schemes and their scheme_ID are:\n");
        formatSchemeListing(error.available).forEach((line) => write(line));
        return 1;
      }
      throw error;
    }

    logger.info("command_complete", { command: command.functionName });
    return 0;
  } finally {
    metrics.logSummary(logger);
  }
}
