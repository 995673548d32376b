#!/usr/bin/env node
import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import dotenv from "dotenv";
import type { TabularSource } from "./types.js";
import { loadConfig } from "./config.js";
import { setLogLevel } from "./logger.js";
import { exportGridToWorkbook } from "./xlsx.js";
import { parseTabularFileFromBuffer } from "./index.js";
import { SqliteCatalogStore } from "./sqliteStore.js";
import { analyzeImport } from "./reconcile.js";
import { applyChangeSet } from "./applyChangeSet.js";
import { createInventorySession, syncInventorySessionById } from "./inventorySync.js";
import { renderResultReport } from "./review.js";
import { EngineError, SessionNotFoundError } from "./errors.js";

const USAGE = `Usage:
  stock-reconcile analyze <file>          show what an import would change
  stock-reconcile apply <file>            analyze and write the changes
  stock-reconcile session <file> [--title <title>]   start an inventory count session
  stock-reconcile sync <sessionId>        apply an inventory count session
  stock-reconcile export <sessionId> [--out <dir>]`;

async function readTabularFile(filePath: string): Promise<TabularSource> {
  const bytes = await readFile(filePath);
  return parseTabularFileFromBuffer(new Uint8Array(bytes), path.basename(filePath));
}

async function main(argv: string[]): Promise<number> {
  dotenv.config();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: "string", default: "." },
      title: { type: "string", default: "" },
    },
  });
  const [command, target] = positionals;
  if (!command || !target) {
    console.error(USAGE);
    return 2;
  }

  const store = new SqliteCatalogStore(config.dbPath);
  try {
    switch (command) {
      case "analyze":
      case "apply": {
        const result = analyzeImport(store, await readTabularFile(target));
        console.log(renderResultReport(result));
        if (command === "apply" && result.hasChanges) {
          const applied = applyChangeSet(store, result);
          console.log(
            `Applied: ${applied.inserted} inserted, ${applied.updated} updated, ${applied.priceHistoryRecords} price records`
          );
        }
        return 0;
      }
      case "session": {
        const source = await readTabularFile(target);
        const session = createInventorySession(store, {
          title: values.title || path.basename(target, path.extname(target)),
          grid: [source.header, ...source.rows],
        });
        console.log(session.id);
        return 0;
      }
      case "sync": {
        const result = syncInventorySessionById(store, target);
        console.log(result.summaryMessage);
        return result.failed > 0 ? 1 : 0;
      }
      case "export": {
        const session = store.getSession(target);
        if (!session) throw new SessionNotFoundError(target);
        const exported = exportGridToWorkbook(session.grid, session.title);
        const outPath = path.join(values.out ?? ".", exported.fileName);
        await writeFile(outPath, exported.bytes);
        console.log(outPath);
        return 0;
      }
      default:
        console.error(USAGE);
        return 2;
    }
  } catch (error) {
    if (error instanceof EngineError) {
      console.error(`${error.code}: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    store.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
