/**
 * `docredact run`
 *
 * Reads one document, redacts it, writes the output and optional reports, and
 * maps the outcome to an exit code. Strict failures are reported only after
 * every artifact has been written.
 */

import fs from "node:fs";
import path from "node:path";
import { deepMerge, loadConfig, validateConfig } from "../config/config.js";
import type { RedactorConfig } from "../config/schema.js";
import { ConfigError, MissingSecretError, RedactionError, UnsupportedFormatError } from "../engine/errors.js";
import { redactDocument, type RedactionResult } from "../engine/pipeline.js";
import { createLogger, type Logger } from "../logger.js";
import { RunStore } from "../memory/store.js";
import { writeReports } from "../report/report.js";
import { HELP, isError, parseArgs, VERSION, type RunArgs } from "./args.js";

export const EXIT = {
  ok: 0,
  usage: 2,
  io: 3,
  config: 4,
  pipeline: 5,
  strict: 6,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export const SUPPORTED_EXTENSIONS: readonly string[] = [".txt", ".text", ".md"];

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  logger: Logger;
};

function defaultIo(): CliIo {
  return {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    env: process.env,
    logger: createLogger("cli"),
  };
}

/** Raised for failures while reading or writing files. */
class IoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IoError";
  }
}

function ensureSupported(filePath: string): void {
  if (!SUPPORTED_EXTENSIONS.includes(path.extname(filePath).toLowerCase())) {
    throw new UnsupportedFormatError(filePath);
  }
}

function io<T>(what: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new IoError(`${what}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
}

/** Config file, then command-line toggles on top. */
export function buildRunConfig(args: RunArgs): RedactorConfig {
  const base = loadConfig(args.config ?? undefined);
  const overrides: Record<string, unknown> = {};
  if (args.noNer) overrides.ner = { enabled: false };
  if (args.coref === "off") overrides.coref = { enabled: false };
  else if (args.coref) overrides.coref = { enabled: true, backend: args.coref };
  return validateConfig(deepMerge(base, { detectors: overrides }));
}

function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof IoError || err instanceof UnsupportedFormatError) return EXIT.io;
  if (err instanceof ConfigError || err instanceof MissingSecretError) return EXIT.config;
  return EXIT.pipeline;
}

function recordRun(storePath: string, args: RunArgs, result: RedactionResult, passed: boolean, durationMs: number, logger: Logger): void {
  const store = new RunStore(storePath, logger);
  try {
    store.recordRun({
      inputPath: args.input,
      docHashB32: result.docHashB32,
      entries: result.applied.length,
      countsByLabel: result.verification.countsByLabel,
      residualCount: result.verification.residualCount,
      score: result.verification.score,
      strict: args.strict,
      passed,
      durationMs,
    });
  } finally {
    store.close();
  }
}

export function runRedaction(args: RunArgs, cli: CliIo): ExitCode {
  const { logger } = cli;
  const started = Date.now();

  ensureSupported(args.input);
  ensureSupported(args.output);
  const config = buildRunConfig(args);

  const text = io(`cannot read ${args.input}`, () => fs.readFileSync(args.input, "utf-8"));
  const result = redactDocument(text, { config, requireSecret: args.requireSecret, env: cli.env, logger });
  if (!result.seedPresent) {
    logger.warn(`no seed secret in ${config.pseudonyms.seed.secret_env}; pseudonyms use unkeyed hashing`);
  }

  io(`cannot write ${args.output}`, () => {
    fs.mkdirSync(path.dirname(path.resolve(args.output)), { recursive: true });
    fs.writeFileSync(args.output, result.redactedText, "utf-8");
  });
  const reportDir = args.reportDir;
  if (reportDir) {
    io(`cannot write reports to ${reportDir}`, () => writeReports(reportDir, result, { logger }));
  }

  const { residualCount, score } = result.verification;
  const failed = args.strict && config.verification.fail_on_residual && residualCount > 0;
  const durationMs = Date.now() - started;

  const storePath = args.store;
  if (storePath) {
    io(`cannot record run in ${storePath}`, () => recordRun(storePath, args, result, !failed, durationMs, logger));
  }

  logger.info(`redacted ${result.applied.length} span(s) in ${durationMs}ms; residual=${residualCount} score=${score}`);
  if (failed) {
    cli.stderr(`verification failed: ${residualCount} residual finding(s), score ${score}`);
    return EXIT.strict;
  }
  return EXIT.ok;
}

export function runCli(argv: string[], overrides: Partial<CliIo> = {}): ExitCode {
  const cli: CliIo = { ...defaultIo(), ...overrides };
  const parsed = parseArgs(argv);

  if (isError(parsed)) {
    cli.stderr(parsed.error);
    return EXIT.usage;
  }

  switch (parsed.command) {
    case "help":
      cli.stdout(HELP);
      return EXIT.ok;
    case "version":
      cli.stdout(VERSION);
      return EXIT.ok;
    case "run":
      try {
        return runRedaction(parsed, cli);
      } catch (err) {
        const code = exitCodeFor(err);
        const label = err instanceof RedactionError ? err.code : "ERROR";
        cli.stderr(`${label}: ${err instanceof Error ? err.message : String(err)}`);
        return code;
      }
  }
}
