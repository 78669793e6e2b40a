import path from "node:path";
import { Command, CommanderError } from "commander";
import { loadConfig } from "./config/loader.js";
import { validateConfig } from "./config/validator.js";
import type { PipelineContext } from "./core/context.js";
import { isPipelineError, PipelineError } from "./core/errors.js";
import { runPipeline } from "./core/pipeline.js";
import { detectPlatform, type HostPlatform } from "./core/platform.js";
import { parseRequestedVersion } from "./core/steps/resolve-version.js";
import { EXIT } from "./commands/exit-codes.js";
import { createChannel } from "./release/channels.js";
import { LATEST } from "./release/version.js";
import { Reporter, type OutputStream } from "./report/reporter.js";
import { createRegistry, DEFAULT_SCHEMA_DIR } from "./schema/registry.js";
import { HttpDownloader, type Downloader, type TransferProgress } from "./transport/downloader.js";
import { GpgVerifier, type SignatureVerifier } from "./trust/gpg.js";
import type { FetchConfig } from "./types/config.js";

export const TOOL_NAME = "cmake-fetch";
export const TOOL_VERSION = "0.1.0";

type CliOptions = {
  verbose?: boolean;
  progress?: boolean;
  repo?: string;
  outputDir?: string;
  trustedKeys?: string;
  config?: string;
  env?: string;
  format?: string;
};

/** Seams for tests; production leaves all of these unset. */
export type CliDeps = {
  stdout?: OutputStream;
  stderr?: OutputStream;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  platform?: HostPlatform;
  schemaDir?: string;
  downloader?: (config: FetchConfig, onProgress?: (p: TransferProgress) => void) => Downloader;
  verifier?: (config: FetchConfig) => SignatureVerifier;
};

function cliOverrides(opts: CliOptions): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (opts.repo !== undefined) overrides.repo = opts.repo;
  if (opts.trustedKeys !== undefined) overrides.trusted_keys_dir = opts.trustedKeys;
  if (opts.format !== undefined) overrides.format = opts.format;
  return overrides;
}

async function fetchRelease(requested: string, opts: CliOptions, deps: CliDeps): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const cwd = deps.cwd ?? process.cwd();
  const verbose = Boolean(opts.verbose);
  // Until config is known, diagnostics go out in the human format.
  let reporter = new Reporter({ format: opts.format === "jsonl" ? "jsonl" : "human", verbose, stdout, stderr });

  try {
    parseRequestedVersion(requested);

    const configResult = validateConfig(
      loadConfig({
        configDir: opts.config ? path.resolve(cwd, opts.config) : undefined,
        envName: opts.env,
        env: deps.env,
        overrides: cliOverrides(opts),
      }),
    );
    if (!configResult.valid) {
      throw new PipelineError("CONFIG_INVALID", `Invalid configuration: ${configResult.errors}`);
    }
    const config = configResult.config;
    reporter = new Reporter({ format: config.format, verbose, stdout, stderr });

    const schemas = createRegistry(deps.schemaDir ?? DEFAULT_SCHEMA_DIR);
    const channel = createChannel(config, schemas);
    const platform = deps.platform ?? detectPlatform();

    const onProgress = opts.progress
      ? (p: TransferProgress) =>
          reporter.info("PROGRESS", `${path.posix.basename(new URL(p.url).pathname)}: ${p.percent}%`, {
            received: p.received,
            total: p.total,
          })
      : undefined;
    const downloader = deps.downloader
      ? deps.downloader(config, onProgress)
      : new HttpDownloader({
          timeoutMs: config.timeout_seconds * 1000,
          userAgent: `${TOOL_NAME}/${TOOL_VERSION}`,
          onProgress,
        });
    const verifier = deps.verifier ? deps.verifier(config) : new GpgVerifier(config.gpg_binary, config.timeout_seconds * 1000);

    const ctx: PipelineContext = {
      config,
      channel,
      platform,
      downloader,
      verifier,
      schemas,
      reporter,
      cwd,
      outputDir: opts.outputDir,
      trustedKeysDir: config.trusted_keys_dir,
    };

    const result = await runPipeline(ctx, requested);
    if (!result.ok) {
      reporter.error(result.error.code, result.error.message, result.error.details);
      return EXIT.FAILURE;
    }
    reporter.debug("DONE", `${config.product} ${result.version} ready in ${result.outputDir}`, {
      stages: result.stages,
    });
    return EXIT.SUCCESS;
  } catch (e) {
    if (isPipelineError(e)) {
      reporter.error(e.code, e.message, e.details);
    } else {
      reporter.error("INTERNAL", e instanceof Error ? e.message : String(e));
    }
    return EXIT.FAILURE;
  }
}

export function createProgram(deps: CliDeps, onExit: (code: number) => void): Command {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description("Download, verify and unpack an official CMake release")
    .version(TOOL_VERSION)
    .argument("[version]", "Release version (MAJOR.MINOR.PATCH[-rcN]) or latest", LATEST)
    .option("-v, --verbose", "Verbose output, including gpg diagnostics")
    .option("-p, --progress", "Show transfer progress")
    .option("-r, --repo <repo>", "Distribution channel: github|kitware")
    .option("-o, --output-dir <dir>", "Output directory (default: <product>-<version>)")
    .option("-k, --trusted-keys <dir>", "Directory of trusted ASCII-armored public keys")
    .option("--config <dir>", "Configuration directory")
    .option("--env <name>", "Configuration overlay to apply over base.yaml")
    .option("--format <format>", "Output format: human|jsonl")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (s) => stdout.write(s),
      writeErr: (s) => stderr.write(s),
      // Parse errors are reported with their code below.
      outputError: () => undefined,
    })
    .action(async (version: string, opts: CliOptions) => {
      onExit(await fetchRelease(version, opts, deps));
    });

  return program;
}

const COMMANDER_CODES: Record<string, "TOO_MANY_ARGUMENTS" | "UNKNOWN_OPTION"> = {
  "commander.excessArguments": "TOO_MANY_ARGUMENTS",
  "commander.unknownOption": "UNKNOWN_OPTION",
};

/** Parse `argv` (without node and script path), run, and return the exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let exitCode: number = EXIT.SUCCESS;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (e) {
    if (!(e instanceof CommanderError)) throw e;
    if (e.exitCode === 0) return EXIT.SUCCESS;
    const reporter = new Reporter({ format: "human", verbose: false, stdout: deps.stdout, stderr: deps.stderr });
    reporter.error(COMMANDER_CODES[e.code] ?? "USAGE", e.message);
    return EXIT.FAILURE;
  }
  return exitCode;
}
