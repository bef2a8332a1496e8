import type { ScorerKind } from "@/lib/healthScoring/types";

export interface PipelineCliArgs {
  tickers: string[];
  input: string | undefined;
  scorer: ScorerKind;
  allYears: boolean;
  help: boolean;
}

export type ParseResult = { ok: true; args: PipelineCliArgs } | { ok: false; error: string };

function isScorerKind(value: string): value is ScorerKind {
  return value === "point_accumulation" || value === "category_weighted";
}

export function parsePipelineArgs(argv: readonly string[]): ParseResult {
  const args: PipelineCliArgs = {
    tickers: [],
    input: undefined,
    scorer: "category_weighted",
    allYears: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--all-years") {
      args.allYears = true;
    } else if (arg === "--input") {
      const val = argv[i + 1];
      if (!val || val.startsWith("--")) return { ok: false, error: "--input requires a file path" };
      args.input = val;
      i++;
    } else if (arg === "--scorer") {
      const val = argv[i + 1] ?? "";
      if (!isScorerKind(val)) return { ok: false, error: `Invalid --scorer value: ${val}` };
      args.scorer = val;
      i++;
    } else if (arg.startsWith("--")) {
      return { ok: false, error: `Unknown option: ${arg}` };
    } else {
      args.tickers.push(arg.trim().toUpperCase());
    }
  }

  return { ok: true, args };
}
