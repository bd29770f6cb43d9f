#!/usr/bin/env node
import path from "node:path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadEnvFile } from "@hh-parser/shared";
import { createCliContext, runParseCommand, runRoomsCommand, type CliOutput } from "./commands";

const io: CliOutput = {
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`)
};

async function parseFiles(files: string[], options: { room?: string; output?: string; headerOnly: boolean }) {
  const env = loadEnvFile(path.resolve(process.cwd(), ".env"));
  const context = await createCliContext(env, options.room);
  try {
    process.exitCode = await runParseCommand(
      context,
      { files, output: options.output, headerOnly: options.headerOnly },
      io
    );
  } finally {
    await context.logger.stop();
  }
}

void yargs(hideBin(process.argv))
  .scriptName("hh-parse")
  .option("room", {
    type: "string",
    describe: "Registered room adapter; overrides HH_ROOM and the config file"
  })
  .command<{ files: string[]; output?: string; room?: string }>(
    "parse <files..>",
    "Parse hand history files and print one JSON object per hand",
    builder =>
      builder
        .positional("files", { type: "string", array: true, demandOption: true })
        .option("output", { type: "string", describe: "Write JSON lines to this file instead of stdout" }),
    async args => {
      await parseFiles(args.files, { room: args.room, output: args.output, headerOnly: false });
    }
  )
  .command<{ files: string[]; room?: string }>(
    "header <files..>",
    "Read only the header line of each file",
    builder => builder.positional("files", { type: "string", array: true, demandOption: true }),
    async args => {
      await parseFiles(args.files, { room: args.room, headerOnly: true });
    }
  )
  .command(
    "rooms",
    "List registered room adapters",
    () => undefined,
    () => {
      process.exitCode = runRoomsCommand(io);
    }
  )
  .demandCommand()
  .help()
  .strict()
  .parse();
