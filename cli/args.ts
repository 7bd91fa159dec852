/**
 * Argument parser for the docredact CLI.
 *
 * One subcommand (`run`) plus help and version. Parsing never throws; errors
 * come back as a `ParseError` so the caller can map them to the usage exit
 * code.
 */

export const VERSION = "0.1.0";

export type CorefChoice = "regex" | "wink" | "auto" | "off";

const COREF_CHOICES: readonly CorefChoice[] = ["regex", "wink", "auto", "off"];

function isCorefChoice(value: string): value is CorefChoice {
  return COREF_CHOICES.some((choice) => choice === value);
}

export interface RunArgs {
  command: "run";
  input: string;
  output: string;
  config: string | null;
  reportDir: string | null;
  strict: boolean;
  requireSecret: boolean;
  store: string | null;
  /** Turns NER off even when the config file enables it. */
  noNer: boolean;
  /** Null keeps whatever the config file says. */
  coref: CorefChoice | null;
}

export interface HelpArgs {
  command: "help";
}

export interface VersionArgs {
  command: "version";
}

export type ParsedArgs = RunArgs | HelpArgs | VersionArgs;

export interface ParseError {
  error: string;
}

export type ParseResult = ParsedArgs | ParseError;

export function isError(result: ParseResult): result is ParseError {
  return "error" in result;
}

export const HELP = `
docredact - deterministic PII redaction for text documents

Usage:
  docredact run --in <path> --out <path> [options]
  docredact --help
  docredact --version

Options:
  --in <path>         Input document (.txt, .text or .md)
  --out <path>        Output document (.txt, .text or .md)
  --config <json>     Configuration file (default: built-in defaults)
  --report <dir>      Write plan, audit, verification, diff and preprocess reports
  --strict            Exit 6 when verification finds residual PII
  --require-secret    Fail when the seed secret is not set (env: REDACTOR_SEED_SECRET)
  --store <db>        Append a run summary to a SQLite database
  --no-ner            Disable the statistical name detector
  --coref <backend>   Coreference backend: regex, wink, auto or off
  -h, --help          Show this help

Exit codes:
  0 ok, 2 usage, 3 I/O or unsupported format, 4 config or missing secret,
  5 pipeline error, 6 strict verification failure
`.trim();

const VALUE_FLAGS = new Set(["--in", "--out", "--config", "--report", "--store", "--coref"]);

export function parseArgs(argv: string[]): ParseResult {
  // Strip node and script path
  const args = argv.slice(2);

  if (args.length === 0) {
    return { command: "help" };
  }

  const sub = args[0];

  if (sub === "--version" || sub === "-v" || sub === "version") {
    return { command: "version" };
  }

  if (sub === "--help" || sub === "-h" || sub === "help") {
    return { command: "help" };
  }

  if (sub === "run") {
    return parseRunArgs(args.slice(1));
  }

  return { error: `Unknown command: ${sub}\n\n${HELP}` };
}

function parseRunArgs(args: string[]): ParseResult {
  const values = new Map<string, string>();
  const result: Omit<RunArgs, "input" | "output"> = {
    command: "run",
    config: null,
    reportDir: null,
    strict: false,
    requireSecret: false,
    store: null,
    noNer: false,
    coref: null,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { command: "help" };
    }

    if (VALUE_FLAGS.has(arg)) {
      i++;
      if (i >= args.length) return { error: `${arg} requires a value` };
      values.set(arg, args[i]);
    } else if (arg === "--strict") {
      result.strict = true;
    } else if (arg === "--require-secret") {
      result.requireSecret = true;
    } else if (arg === "--no-ner") {
      result.noNer = true;
    } else {
      return { error: `Unknown option: ${arg}` };
    }
    i++;
  }

  const input = values.get("--in");
  const output = values.get("--out");
  if (!input) return { error: `--in is required\n\n${HELP}` };
  if (!output) return { error: `--out is required\n\n${HELP}` };

  const coref = values.get("--coref");
  if (coref !== undefined && !isCorefChoice(coref)) {
    return { error: `Invalid coref backend: ${coref}. Must be one of: ${COREF_CHOICES.join(", ")}` };
  }

  return {
    ...result,
    input,
    output,
    config: values.get("--config") ?? null,
    reportDir: values.get("--report") ?? null,
    store: values.get("--store") ?? null,
    coref: coref ?? null,
  };
}
