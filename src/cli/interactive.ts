import { createInterface } from "node:readline/promises";
import type { Readable, Writable } from "node:stream";
import type { ResearchSystem } from "../research/system.js";
import { ResearchError, errorText } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import {
  INTERACTIVE_HELP,
  formatExport,
  formatHistory,
  formatResult,
  formatSystemInfo,
} from "./display.js";

const log = createLogger("interactive");

export const EXIT_KEYWORDS = new Set(["quit", "exit", "q"]);
const PROMPT = "\n🔍 Research query: ";
/** `export` alone, or followed by a session id (a ulid) */
const EXPORT_COMMAND = /^export(?:\s+([0-9A-HJKMNP-TV-Z]{26}))?$/i;

export interface InteractiveIo {
  input: Readable;
  output: Writable;
}

export interface InteractiveOptions {
  citations?: boolean;
  full?: boolean;
}

/**
 * Read queries line by line until an exit keyword or end of input.
 * Returns the number of queries researched.
 */
export async function runInteractive(
  system: ResearchSystem,
  io: InteractiveIo,
  options: InteractiveOptions = {}
): Promise<number> {
  const print = (text: string) => io.output.write(`${text}\n`);
  const rl = createInterface({ input: io.input, terminal: false });

  print("🎯 Interactive Research Mode");
  print("Enter your research queries (type 'quit', 'exit', or 'q' to stop)");
  print("Type 'help' for available commands");

  let processed = 0;
  io.output.write(PROMPT);
  try {
    for await (const rawLine of rl) {
      const line = rawLine.trim();
      const command = line.toLowerCase();

      if (EXIT_KEYWORDS.has(command)) break;

      if (line) {
        const exportMatch = EXPORT_COMMAND.exec(line);
        if (command === "help") {
          print(`\n${INTERACTIVE_HELP}`);
        } else if (command === "info") {
          print(formatSystemInfo(system.getSystemInfo()));
        } else if (command === "history") {
          print(formatHistory(system.getHistory(), system.recordedSessions()));
        } else if (command === "followup") {
          print("Usage: followup <question>");
        } else if (exportMatch) {
          printExport(system, exportMatch[1], print);
        } else {
          const followUp = /^followup\s+(.+)$/i.exec(line);
          if (await research(system, followUp, line, print, options)) {
            processed++;
          }
        }
      }
      io.output.write(PROMPT);
    }
  } finally {
    rl.close();
  }

  print(
    processed > 0
      ? `\n📈 Session completed! Processed ${processed} research queries.`
      : "\n📈 Session ended. No queries processed."
  );
  return processed;
}

function printExport(
  system: ResearchSystem,
  id: string | undefined,
  print: (text: string) => void
): void {
  const detail = system.exportSession(id?.toUpperCase());
  if (detail) {
    print(formatExport(detail));
  } else if (id) {
    print(`❌ No recorded session with id ${id}`);
  } else {
    print("❌ No recorded session to export yet.");
  }
}

async function research(
  system: ResearchSystem,
  followUp: RegExpExecArray | null,
  line: string,
  print: (text: string) => void,
  options: InteractiveOptions
): Promise<boolean> {
  print("🔄 Researching...");
  try {
    const result = followUp
      ? await system.followUp(followUp[1], { citations: options.citations })
      : await system.conductResearch(line, { citations: options.citations });
    print(formatResult(result, { showDetails: false, full: options.full }));
    return true;
  } catch (err) {
    if (err instanceof ResearchError) {
      print(`❌ Research Error: ${err.userMessage}`);
    } else {
      print(`❌ Unexpected error: ${errorText(err)}`);
      log.error("Unexpected error in interactive mode", {
        error: errorText(err),
      });
    }
    return false;
  }
}
