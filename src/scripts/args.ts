import { ConfigurationError } from "../errors";

export interface RunnerArgs {
  searchTerm: string;
  maxRecords?: number;
}

/** `runScraper ACME corp --max 50` -> { searchTerm: "ACME corp", maxRecords: 50 } */
export function parseArgs(argv: string[]): RunnerArgs {
  const words: string[] = [];
  let maxRecords: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--max") {
      const raw = argv[i + 1];
      const parsed = Number(raw);
      if (raw === undefined || !Number.isInteger(parsed) || parsed < 1) {
        throw new ConfigurationError(`--max expects a positive integer, got "${raw ?? ""}"`);
      }
      maxRecords = parsed;
      i += 1;
    } else {
      words.push(arg);
    }
  }

  const searchTerm = words.join(" ").trim();
  if (!searchTerm) {
    throw new ConfigurationError('Usage: runScraper "SEARCH TERM" [--max N]');
  }
  return { searchTerm, maxRecords };
}
