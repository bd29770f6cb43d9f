import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { LogLevel, type ParserConfig, type StructuredLogEvent } from "@hh-parser/shared";
import { StructuredLogger } from "@hh-parser/logger";
import {
  createCliContext,
  resolveCliConfig,
  runParseCommand,
  runRoomsCommand,
  type CliContext,
  type CliOutput
} from "../src/cli/commands";
import { fullTiltPoker } from "../src/rooms/fullTilt";

const repoRoot = path.resolve(__dirname, "../../..");
const fixturePath = (name: string) => path.join(__dirname, "fixtures", name);

const config: ParserConfig = {
  room: "fulltilt",
  logging: { level: LogLevel.DEBUG, console: false },
  batch: { failFast: false }
};

function collectingOutput() {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliOutput = { out: line => out.push(line), err: line => err.push(line) };
  return { io, out, err };
}

function memoryContext(received: StructuredLogEvent[]): CliContext {
  const logger = new StructuredLogger({
    sessionId: "cli-test",
    component: "hh-parse",
    level: LogLevel.DEBUG,
    sinks: [
      {
        name: "memory",
        level: LogLevel.DEBUG,
        publish: async event => {
          received.push(event);
        }
      }
    ]
  });
  return { config, adapter: fullTiltPoker, logger };
}

describe("resolveCliConfig", () => {
  it("reads the file named by HH_CONFIG and applies overrides", () => {
    const resolved = resolveCliConfig(
      { HH_CONFIG: "config/parser.config.json", HH_LOG_LEVEL: "warn", HH_ROOM: "" },
      repoRoot
    );
    expect(resolved.room).toBe("fulltilt");
    expect(resolved.logging.level).toBe(LogLevel.WARN);
    expect(resolved.logging.file).toBeUndefined();
  });

  it("adds a file sink from HH_LOG_DIR", () => {
    const resolved = resolveCliConfig(
      { HH_LOG_DIR: "results/logs", HH_LOG_MAX_FILES: "10", HH_LOG_MAX_FILE_SIZE_MB: "" },
      repoRoot
    );
    expect(resolved.logging.file).toEqual({ outputDir: path.join(repoRoot, "results/logs"), maxFiles: 10 });
  });
});

describe("parse command", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "hh-cli-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("prints one JSON line per hand and fails on unreadable files", async () => {
    const received: StructuredLogEvent[] = [];
    const context = memoryContext(received);
    const { io, out, err } = collectingOutput();
    const missing = path.join(tempDir, "missing.txt");

    const code = await runParseCommand(
      context,
      { files: [fixturePath("fulltilt_showdown.txt"), fixturePath("fulltilt_flop.txt"), missing] },
      io
    );
    await context.logger.stop();

    expect(code).toBe(1);
    expect(out).toHaveLength(2);
    const first: unknown = JSON.parse(out[0]);
    expect(first).toMatchObject({ ident: "31002750911", winners: ["alpha"], totalPot: 1035 });
    expect(err).toHaveLength(1);
    expect(err[0].startsWith(`${missing}: Stage 'load' failed: ENOENT`)).toBe(true);

    const completed = received.find(event => event.event === "batch.completed");
    expect(completed?.component).toBe("batch");
    expect(completed?.payload).toEqual({ total: 3, parsed: 2, failed: 1 });
  });

  it("writes to --output and exits cleanly", async () => {
    const context = memoryContext([]);
    const { io, out, err } = collectingOutput();
    const output = path.join(tempDir, "hands.jsonl");

    const code = await runParseCommand(context, { files: [fixturePath("fulltilt_preflop.txt")], output }, io);
    await context.logger.stop();

    expect(code).toBe(0);
    expect(out).toEqual([]);
    expect(err).toEqual([]);
    const lines = (await fs.readFile(output, "utf-8")).split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[1]).toBe("");
    expect(JSON.parse(lines[0])).toMatchObject({ ident: "31100220033", hero: "juliet" });
  });

  it("reads only headers in header mode", async () => {
    const context = memoryContext([]);
    const { io, out } = collectingOutput();

    await runParseCommand(context, { files: [fixturePath("fulltilt_flop.txt")], headerOnly: true }, io);
    await context.logger.stop();

    expect(JSON.parse(out[0])).toMatchObject({ state: "header_parsed", players: [], tableName: "12" });
  });

  it("builds a context for the requested room", async () => {
    const cfgPath = path.join(tempDir, "parser.json");
    await fs.writeFile(cfgPath, JSON.stringify(config), "utf-8");

    const context = await createCliContext({ HH_CONFIG: cfgPath, HH_SESSION_ID: "cli-test" }, "FullTilt");
    await context.logger.stop();

    expect(context.adapter).toBe(fullTiltPoker);
    expect(context.config.logging.level).toBe(LogLevel.DEBUG);
  });
});

describe("rooms command", () => {
  it("lists registered rooms", () => {
    const { io, out } = collectingOutput();
    expect(runRoomsCommand(io)).toBe(0);
    expect(out).toEqual(["fulltilt"]);
  });
});
