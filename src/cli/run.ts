import type { Readable, Writable } from "node:stream";
import { parseArgs } from "node:util";
import { HistoryStore } from "../db/queries.js";
import { createLlmClient } from "../llm/client.js";
import { ResearchSystem } from "../research/system.js";
import { loadConfig } from "../shared/config.js";
import { ConfigError, ResearchError, errorText } from "../shared/errors.js";
import { createLogger, setLogDir, setLogLevel } from "../shared/logger.js";
import {
  USAGE,
  formatExport,
  formatHistory,
  formatResult,
  formatSystemInfo,
} from "./display.js";
import { runInteractive } from "./interactive.js";

const log = createLogger("cli");

export const DEMO_QUERIES = [
  "What are the benefits of renewable energy adoption?",
  "How does artificial intelligence impact modern education?",
  "What are the key challenges in sustainable urban development?",
] as const;

export interface CliIo {
  stdin: Readable;
  stdout: Writable;
  env: Record<string, string | undefined>;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      interactive: { type: "boolean", short: "i" },
      verbose: { type: "boolean", short: "v" },
      model: { type: "string", short: "m" },
      "orchestrator-model": { type: "string" },
      "research-model": { type: "string" },
      mock: { type: "boolean" },
      citations: { type: "boolean" },
      sequential: { type: "boolean" },
      full: { type: "boolean" },
      history: { type: "boolean" },
      export: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

/**
 * CLI body, separated from process wiring so it can run against in-memory
 * streams. Resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const print = (text: string) => io.stdout.write(`${text}\n`);

  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    print(`❌ ${errorText(err)}`);
    print(USAGE);
    return EXIT_USAGE;
  }
  const { values, positionals } = args;

  if (values.help) {
    print(USAGE);
    return EXIT_OK;
  }

  let store: HistoryStore | undefined;
  try {
    const config = loadConfig(io.env, {
      model: values.model,
      orchestratorModel: values["orchestrator-model"],
      researchModel: values["research-model"],
      mock: values.mock ? true : undefined,
      parallel: values.sequential ? false : undefined,
    });
    setLogLevel(values.verbose ? "debug" : config.logLevel);
    setLogDir(config.logDir);

    store = HistoryStore.open(config.dbPath);
    const system = new ResearchSystem({
      client: createLlmClient(config),
      config,
      store,
    });

    if (values.history) {
      print(formatHistory(system.getHistory(), system.recordedSessions()));
      return EXIT_OK;
    }

    if (values.export !== undefined) {
      const detail = system.exportSession(values.export);
      if (!detail) {
        print(`❌ No recorded session with id ${values.export}`);
        return EXIT_FAILURE;
      }
      print(formatExport(detail));
      return EXIT_OK;
    }

    print(formatSystemInfo(system.getSystemInfo()));
    print("");

    const citations = values.citations ?? false;
    const full = values.full ?? false;

    if (values.interactive) {
      await runInteractive(
        system,
        { input: io.stdin, output: io.stdout },
        { citations, full }
      );
      return EXIT_OK;
    }

    if (positionals.length > 0) {
      print("🔄 Researching...");
      const result = await system.conductResearch(positionals.join(" "), {
        citations,
      });
      print(formatResult(result, { showDetails: values.verbose, full }));
      return EXIT_OK;
    }

    return await runPresetQueries(system, print, {
      citations,
      full,
      verbose: values.verbose ?? false,
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      print(`❌ Configuration Error: ${err.message}`);
      print("💡 Make sure to set your ANTHROPIC_API_KEY in the .env file, or pass --mock");
      return EXIT_FAILURE;
    }
    if (err instanceof ResearchError) {
      print(`❌ Research Error: ${err.userMessage}`);
      return EXIT_FAILURE;
    }
    print(`❌ Fatal Error: ${errorText(err)}`);
    log.error("Fatal error", { error: errorText(err) });
    return EXIT_FAILURE;
  } finally {
    store?.close();
  }
}

async function runPresetQueries(
  system: ResearchSystem,
  print: (text: string) => void,
  opts: { citations: boolean; full: boolean; verbose: boolean }
): Promise<number> {
  let successful = 0;

  for (const [i, query] of DEMO_QUERIES.entries()) {
    print(`\n🔍 Research Query ${i + 1}: ${query}`);
    print("-".repeat(60));
    try {
      print("🔄 Researching...");
      const result = await system.conductResearch(query, {
        citations: opts.citations,
      });
      print(formatResult(result, { showDetails: opts.verbose, full: opts.full }));
      successful++;
    } catch (err) {
      if (!(err instanceof ResearchError)) throw err;
      print(`❌ Research Error: ${err.userMessage}`);
    }
  }

  print("\n📈 Session Summary:");
  print(
    `Completed ${successful}/${DEMO_QUERIES.length} research queries successfully`
  );
  return successful === DEMO_QUERIES.length ? EXIT_OK : EXIT_FAILURE;
}
