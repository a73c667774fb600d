import { ALL, parseCategoryQuery, type CategoryQuery, type CodeRecord } from "../shared/record.js";
import type { DownloadOrchestrator } from "../store/orchestrator.js";
import type { TieredStore } from "../store/tiered-store.js";
import { serializeCsv } from "../store/csv.js";

export type CliOptions = {
  download: boolean;
  get: boolean;
  query: CategoryQuery;
  allowDownload: boolean;
  csvPath: string | null;
  json: boolean;
};

export const parseArgs = (argv: string[]): CliOptions => {
  const args = new Map<string, string | boolean>();
  for (const arg of argv) {
    if (arg === "--download" || arg === "-d") {
      args.set("download", true);
      continue;
    }
    if (arg === "--get" || arg === "-g") {
      args.set("get", true);
      continue;
    }
    if (arg === "--no-download") {
      args.set("no-download", true);
      continue;
    }
    if (arg === "--json") {
      args.set("json", true);
      continue;
    }
    if (arg.startsWith("--category=")) {
      args.set("category", arg.slice("--category=".length));
      continue;
    }
    if (arg.startsWith("--csv=")) {
      args.set("csv", arg.slice("--csv=".length));
      continue;
    }
    throw new Error(`Unknown argument: ${arg}`);
  }

  const category = args.get("category");
  const download = args.get("download") === true;
  const get = args.get("get") === true;
  const csv = args.get("csv");

  return {
    download,
    // No action flags means a plain query.
    get: get || !download,
    query: typeof category === "string" ? parseCategoryQuery(category) : ALL,
    allowDownload: args.get("no-download") !== true,
    csvPath: typeof csv === "string" && csv !== "" ? csv : null,
    json: args.get("json") === true
  };
};

export type CliDeps = {
  store: TieredStore;
  orchestrator: DownloadOrchestrator;
  print: (text: string) => void;
};

const render = (records: CodeRecord[], json: boolean) =>
  json ? JSON.stringify(records, null, 2) : serializeCsv(records).trimEnd();

/** Resolves to the process exit code. */
export const runCli = async (options: CliOptions, deps: CliDeps): Promise<number> => {
  let exitCode = 0;

  if (options.download) {
    const result = await deps.orchestrator.refresh({ exportCsvPath: options.csvPath });
    deps.print(render(result.records, options.json));
    if (!result.persisted.ok) {
      exitCode = 1;
    }
  }

  if (options.get) {
    const records = await deps.store.query(options.query, { download: options.allowDownload });
    deps.print(render(records, options.json));
  }

  return exitCode;
};
