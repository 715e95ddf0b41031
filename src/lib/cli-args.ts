import { config } from "./config";

export interface CliArgs {
  indexUrl: string;
  referenceUrl: string;
  outDir: string;
  skipRows: number;
  concurrency: number;
  failFast: boolean;
  loadDb: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    indexUrl: config.indexUrl,
    referenceUrl: config.referenceUrl,
    outDir: config.outputDir,
    skipRows: config.skipRows,
    concurrency: config.concurrency,
    failFast: false,
    loadDb: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const value = argv[i + 1];
    switch (argv[i]) {
      case "--index-url":
        args.indexUrl = value ?? "";
        i++;
        break;
      case "--reference-url":
        args.referenceUrl = value ?? "";
        i++;
        break;
      case "--out-dir":
        args.outDir = value ?? args.outDir;
        i++;
        break;
      case "--skip-rows":
        args.skipRows = parseInt(value ?? "", 10);
        i++;
        break;
      case "--concurrency":
        args.concurrency = parseInt(value ?? "", 10);
        i++;
        break;
      case "--fail-fast":
        args.failFast = true;
        break;
      case "--load-db":
        args.loadDb = true;
        break;
      default:
        throw new Error(`Unknown argument: ${argv[i]}`);
    }
  }

  if (!args.indexUrl) throw new Error("--index-url (or INDEX_URL) is required");
  if (Number.isNaN(args.skipRows) || args.skipRows < 0) throw new Error("--skip-rows must be >= 0");
  if (Number.isNaN(args.concurrency) || args.concurrency < 1) {
    throw new Error("--concurrency must be >= 1");
  }
  return args;
}
