import type { ProviderLogger } from "@maintainer-pulse/provider-github";

export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
}

function formatDetails(details: Record<string, unknown> | undefined): string {
  return details ? ` ${JSON.stringify(details)}` : "";
}

/** Routes provider diagnostics to the CLI output; debug lines only when verbose. */
export function createProviderLogger(io: CliIO, verbose: boolean): ProviderLogger {
  return {
    debug: (message, details) => {
      if (verbose) {
        io.log(`[github] ${message}${formatDetails(details)}`);
      }
    },
    warn: (message, details) => io.error(`[github] ${message}${formatDetails(details)}`)
  };
}

export function defaultIO(): CliIO {
  return {
    log: (message) => console.log(message),
    error: (message) => console.error(message)
  };
}
