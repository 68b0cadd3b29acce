import { ConfigValidationError, runMonteCarlo, runTrial, summarizeTrial } from "../../core";
import { parseCliArgs, USAGE } from "./args";
import { formatMonteCarlo, formatSingleRun, toLedgerRow } from "./format";

export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
  table(rows: object[]): void;
}

const consoleOutput: CliOutput = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
  table: (rows) => console.table(rows),
};

function isArgumentError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("ERR_PARSE_ARGS")
  );
}

/** Returns the process exit code. */
export function runCli(argv: string[], out: CliOutput = consoleOutput): number {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      out.log(USAGE);
      return 0;
    }

    if (options.iterations === 1 && options.shoePolicy === "shared") {
      out.error("--shared-shoe needs --iterations above 1");
      out.error(USAGE);
      return 1;
    }

    if (options.iterations === 1) {
      const ledger = runTrial(options.config);
      formatSingleRun(summarizeTrial(ledger, 1)).forEach((line) => out.log(line));
      if (options.showLedger) {
        out.log("");
        out.log("Hand History");
        out.table(ledger.map(toLedgerRow));
      }
      return 0;
    }

    const result = runMonteCarlo(options.config, options.iterations, options.config.seed, {
      shoePolicy: options.shoePolicy,
    });
    formatMonteCarlo(result).forEach((line) => out.log(line));
    return 0;
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      out.error("Invalid configuration:");
      error.issues.forEach((issue) => out.error(`  ${issue}`));
      return 1;
    }
    if (isArgumentError(error)) {
      out.error(error.message);
      out.error(USAGE);
      return 1;
    }
    throw error;
  }
}
