import type { CliIO } from "./cli.js";
import { errorMessage, exitCodeFor } from "./errors.js";

/**
 * Load the CLI and run it. The CLI is imported lazily so that configuration
 * errors raised while modules load are reported like any other failure.
 */
export async function main(argv: string[], io?: CliIO): Promise<number> {
  try {
    const { run } = await import("./cli.js");
    return run(argv, { io });
  } catch (err) {
    const message = `Error: ${errorMessage(err)}\n`;
    if (io) io.stderr(message);
    else process.stderr.write(message);
    return exitCodeFor(err);
  }
}
