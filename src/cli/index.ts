#!/usr/bin/env node
import { isUtfTableError } from "../binary/errors.js";
import { formatSchema, runBuild, runDump, runSchema } from "./commands.js";

const args = process.argv.slice(2);
const consumedArgs = new Set<number>();

const readFlagValue = (flag: string): string | undefined => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return undefined;
  }

  consumedArgs.add(index);
  const value = args[index + 1];
  if (value && !value.startsWith("--")) {
    consumedArgs.add(index + 1);
    return value;
  }
  return undefined;
};

const readSwitch = (flag: string): boolean => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return false;
  }
  consumedArgs.add(index);
  return true;
};

const packetFlag = readFlagValue("--packet");
const outputFlag = readFlagValue("--output");
const encryptFlag = readSwitch("--encrypt");
const [command, ...positionalArgs] = args.filter(
  (value, index) => !consumedArgs.has(index) && !value.startsWith("--")
);

const usage = (): never => {
  console.error(
    "Usage: utf-table schema <table.bin> [--packet TAG]\n" +
      "       utf-table dump <table.bin> [--packet TAG] [--output manifest.json]\n" +
      "       utf-table build <manifest.json> <table.bin> [--packet TAG] [--encrypt]"
  );
  process.exit(1);
};

const abortController = new AbortController();

process.on("SIGINT", () => {
  if (!abortController.signal.aborted) {
    console.error("Aborting: received SIGINT.");
    abortController.abort();
  }
});

const run = async (): Promise<void> => {
  const signal = abortController.signal;
  const [first, second] = positionalArgs;
  try {
    switch (command) {
      case "schema": {
        if (!first) return usage();
        const { schema, encrypted } = await runSchema(first, { packet: packetFlag, signal });
        for (const line of formatSchema(schema)) {
          console.log(line);
        }
        if (encrypted !== undefined) {
          console.log(`Encrypted: ${encrypted ? "yes" : "no"}`);
        }
        return;
      }
      case "dump": {
        if (!first) return usage();
        const result = await runDump(first, { packet: packetFlag, output: outputFlag, signal });
        if (outputFlag) {
          console.log(`Wrote ${result.rowCount} rows to ${outputFlag}`);
        } else {
          process.stdout.write(result.manifest);
        }
        return;
      }
      case "build": {
        if (!first || !second) return usage();
        console.log(`Input manifest: ${first}`);
        console.log(`Output table: ${second}`);
        const stats = await runBuild(first, second, { packet: packetFlag, encrypt: encryptFlag, signal });
        console.log("Success: output written.");
        console.log(`  Table:     ${stats.tableName}`);
        console.log(`  Columns:   ${stats.columnCount}`);
        console.log(`  Rows:      ${stats.rowCount}`);
        console.log(`  Bytes:     ${stats.byteLength}`);
        console.log(`  Encrypted: ${stats.encrypted ? "yes" : "no"}`);
        return;
      }
      default:
        return usage();
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(isUtfTableError(error) ? `${error.code}: ${message}` : message);
    process.exitCode = 1;
  }
};

void run();
