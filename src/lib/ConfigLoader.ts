/**
 * Configuration loader for ext-sorter
 *
 * Sources, lowest precedence first: built-in defaults, a JSON config file
 * (`--config` or EXT_SORTER_CONFIG), command-line flags.
 */

import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "util";
import { z } from "zod";
import { LogLevel, RunConfig } from "../interfaces/IRunConfig";
import { ConfigError, errorMessage, isNodeError } from "../types";

export const CONFIG_ENV_VAR = "EXT_SORTER_CONFIG";

export const DEFAULTS: {
  concurrency: number;
  retries: number;
  retryDelay: number;
  logLevel: LogLevel;
} = {
  concurrency: 8,
  retries: 3,
  retryDelay: 0.5,
  logLevel: "info",
};

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

/**
 * Numbers arrive as strings from the command line and as numbers from JSON
 */
const numeric = (schema: z.ZodNumber) =>
  z.union([z.number(), z.string()]).pipe(schema);

/**
 * Settings as a user writes them, in a config file or on the command line
 */
export const ConfigFileSchema = z
  .object({
    source: z.string().min(1),
    destination: z.string().min(1),
    concurrency: numeric(z.coerce.number().int().min(1).max(1024)),
    retries: numeric(z.coerce.number().int().min(0).max(100)),
    /** Seconds */
    retryDelay: numeric(z.coerce.number().min(0).max(3600)),
    skipLocked: z.boolean(),
    silentLocked: z.boolean(),
    excludeGlobs: z.array(z.string().min(1)),
    logLevel: LogLevelSchema,
    report: z.string().min(1),
  })
  .partial()
  .strict();

export type ConfigInput = z.input<typeof ConfigFileSchema>;

/**
 * Fully merged settings, before paths are resolved and checked
 */
export const RunConfigSchema = ConfigFileSchema.required({
  source: true,
  destination: true,
  concurrency: true,
  retries: true,
  retryDelay: true,
  skipLocked: true,
  silentLocked: true,
  excludeGlobs: true,
  logLevel: true,
});

export interface ParsedArguments {
  help: boolean;
  configPath?: string;
  values: ConfigInput;
}

const CLI_OPTIONS = {
  source: { type: "string" },
  destination: { type: "string" },
  concurrency: { type: "string" },
  "max-workers": { type: "string" },
  retries: { type: "string" },
  "retry-delay": { type: "string" },
  "skip-locked": { type: "boolean" },
  "silent-locked": { type: "boolean" },
  "exclude-glob": { type: "string", multiple: true },
  "log-level": { type: "string" },
  report: { type: "string" },
  config: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

export class ConfigLoader {
  /**
   * Parse command-line arguments (without the node and script entries)
   */
  static parseArgv(argv: readonly string[]): ParsedArguments {
    let parsed;
    try {
      parsed = parseArgs({
        args: [...argv],
        options: CLI_OPTIONS,
        allowPositionals: true,
        strict: true,
      });
    } catch (error) {
      throw new ConfigError(errorMessage(error));
    }

    const { values, positionals } = parsed;
    if (positionals.length > 2) {
      throw new ConfigError(
        `Unexpected arguments: ${positionals.slice(2).join(" ")}`
      );
    }

    const input: ConfigInput = {};
    const source = values.source ?? positionals[0];
    const destination = values.destination ?? positionals[1];
    const concurrency = values.concurrency ?? values["max-workers"];

    if (source !== undefined) input.source = source;
    if (destination !== undefined) input.destination = destination;
    if (concurrency !== undefined) input.concurrency = concurrency;
    if (values.retries !== undefined) input.retries = values.retries;
    if (values["retry-delay"] !== undefined) input.retryDelay = values["retry-delay"];
    if (values["skip-locked"] !== undefined) input.skipLocked = values["skip-locked"];
    if (values["silent-locked"] !== undefined) input.silentLocked = values["silent-locked"];
    if (values["exclude-glob"] !== undefined) input.excludeGlobs = values["exclude-glob"];
    if (values["log-level"] !== undefined) {
      const level = LogLevelSchema.safeParse(values["log-level"]);
      if (!level.success) {
        throw new ConfigError(
          `Invalid --log-level "${values["log-level"]}": expected one of ${LogLevelSchema.options.join(", ")}`
        );
      }
      input.logLevel = level.data;
    }
    if (values.report !== undefined) input.report = values.report;

    return {
      help: values.help ?? false,
      configPath: values.config,
      values: input,
    };
  }

  /**
   * Read and validate a JSON config file
   */
  static async loadConfigFile(configPath: string): Promise<ConfigInput> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(configPath, "utf-8");
    } catch (error) {
      throw new ConfigError(
        `Cannot read config file ${configPath}: ${errorMessage(error)}`
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(
        `Config file ${configPath} is not valid JSON: ${errorMessage(error)}`
      );
    }

    const result = ConfigFileSchema.safeParse(data);
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file ${configPath}: ${formatIssues(result.error)}`
      );
    }
    return result.data;
  }

  /**
   * Build the frozen RunConfig for a run
   *
   * @throws ConfigError for any invalid or missing setting
   */
  static async loadConfig(
    argv: readonly string[],
    env: NodeJS.ProcessEnv = process.env
  ): Promise<RunConfig> {
    const args = ConfigLoader.parseArgv(argv);
    const configPath = args.configPath ?? env[CONFIG_ENV_VAR];
    const fromFile = configPath
      ? await ConfigLoader.loadConfigFile(configPath)
      : {};

    return ConfigLoader.resolve({ ...fromFile, ...args.values });
  }

  /**
   * Apply defaults, validate and check the source and destination roots
   */
  static async resolve(input: ConfigInput): Promise<RunConfig> {
    const result = RunConfigSchema.safeParse({
      concurrency: DEFAULTS.concurrency,
      retries: DEFAULTS.retries,
      retryDelay: DEFAULTS.retryDelay,
      skipLocked: false,
      silentLocked: false,
      excludeGlobs: [],
      logLevel: DEFAULTS.logLevel,
      ...input,
    });
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
    }
    const settings = result.data;

    const sourceRoot = path.resolve(settings.source);
    const destinationRoot = path.resolve(settings.destination);

    await checkDirectory(sourceRoot, "Source", true);
    await checkDirectory(destinationRoot, "Destination", false);
    if (sourceRoot === destinationRoot) {
      throw new ConfigError("Destination must differ from the source directory");
    }

    return Object.freeze({
      sourceRoot,
      destinationRoot,
      maxConcurrency: settings.concurrency,
      maxRetries: settings.retries,
      retryBaseDelayMs: Math.round(settings.retryDelay * 1000),
      skipLocked: settings.skipLocked,
      silentLocked: settings.silentLocked,
      excludeGlobs: Object.freeze([...settings.excludeGlobs]),
      logLevel: settings.logLevel,
      reportFile: settings.report ? path.resolve(settings.report) : undefined,
    });
  }

  static usage(): string {
    return [
      "Usage: ext-sorter [source] [destination] [options]",
      "",
      "Copy every file under <source> into <destination>/<extension>/.",
      "",
      "Options:",
      "  --source <dir>            Directory to scan",
      "  --destination <dir>       Output directory, created if absent",
      `  --concurrency <n>         Simultaneous copies (default ${DEFAULTS.concurrency}, alias --max-workers)`,
      `  --retries <n>             Retries for locked or transient errors (default ${DEFAULTS.retries})`,
      `  --retry-delay <seconds>   Base backoff delay, doubled per retry (default ${DEFAULTS.retryDelay})`,
      "  --skip-locked             Report files that stay locked as skipped, not failed",
      "  --silent-locked           Do not warn about skipped locked files",
      "  --exclude-glob <pattern>  Exclude matching files and directories (repeatable)",
      "  --log-level <level>       debug, info, warn, error or silent (default info)",
      "  --report <file>           Write the run summary as JSON",
      `  --config <file>           JSON config file (or ${CONFIG_ENV_VAR})`,
      "  -h, --help                Show this help",
      "",
      "Exit codes: 0 success, 1 some files failed, 2 configuration error, 130 cancelled",
    ].join("\n");
  }
}

async function checkDirectory(
  dirPath: string,
  label: string,
  mustExist: boolean
): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(dirPath);
  } catch (error) {
    if (isNodeError(error) && error.code === "ENOENT" && !mustExist) {
      return;
    }
    throw new ConfigError(
      `${label} directory is not accessible: ${dirPath} (${errorMessage(error)})`
    );
  }
  if (!stats.isDirectory()) {
    throw new ConfigError(`${label} is not a directory: ${dirPath}`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}
