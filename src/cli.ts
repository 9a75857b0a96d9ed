#!/usr/bin/env node
import { readFile, writeFile } from "node:fs/promises";
import { createGateway } from "./classifier/index.js";
import { loadLlmConfig } from "./config/llm.js";
import { toTriageSettings } from "./config/triage.js";
import { rawMessageSchema } from "./parser/index.js";
import { TriagePipeline } from "./pipeline/index.js";
import { addTriageJob, closeRedisConnection, closeTriageQueue } from "./queue/index.js";
import type { RawMessage, TriageOutput } from "./types/index.js";

const DEFAULT_URL = "http://127.0.0.1:8000";

function printUsage(): void {
  console.log(`
Usage: tsx src/cli.ts <command> [options]

Commands:
  triage <file>                 Triage messages locally with the configured model
  call <file> [options]         Send messages to a running triage API
  enqueue <file>                Enqueue messages for the triage worker

Input:
  <file> holds one provider message object or a JSON array of them.

Call Options:
  --url <base>                  API base URL (default: ${DEFAULT_URL})
  --api-key <key>               Value for the x-api-key header
  --out <path>                  Write one JSON line per response and print a summary
`.trim());
}

function parseArgs(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--")) {
      const key = args[i].slice(2);
      const value = args[i + 1];
      if (value && !value.startsWith("--")) {
        result[key] = value;
        i++;
      } else {
        result[key] = "true";
      }
    }
  }
  return result;
}

async function readMessages(file: string): Promise<RawMessage[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(file, "utf8"));
  } catch (err) {
    throw new Error(`Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  return items.map((item, index) => {
    const result = rawMessageSchema.safeParse(item);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new Error(`Message #${index} is invalid: ${issues.join("; ")}`);
    }
    return result.data;
  });
}

async function triageLocally(file: string): Promise<void> {
  const messages = await readMessages(file);
  const config = loadLlmConfig();
  const pipeline = new TriagePipeline({
    gateway: createGateway(config),
    settings: toTriageSettings(config),
  });

  for (const message of messages) {
    const output = await pipeline.run(message);
    console.log(JSON.stringify({ messageId: message.id, output }, null, 2));
  }
}

function tally(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function printDistribution(title: string, counts: Map<string, number>): void {
  console.log(`\n${title}:`);
  const rows = [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  for (const [key, count] of rows) {
    console.log(`  ${key.padEnd(32)} ${count}`);
  }
}

function isTriageResponse(body: unknown): body is { output: TriageOutput } {
  return typeof body === "object" && body !== null && "output" in body;
}

async function callApi(file: string, opts: Record<string, string>): Promise<void> {
  const messages = await readMessages(file);
  const base = (opts.url ?? DEFAULT_URL).replace(/\/+$/, "");
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (opts["api-key"]) headers["x-api-key"] = opts["api-key"];

  const lines: string[] = [];
  const categories = new Map<string, number>();
  const actionKeys = new Map<string, number>();
  let failures = 0;

  for (const message of messages) {
    const res = await fetch(`${base}/api/v1/ai/triage`, {
      method: "POST",
      headers,
      body: JSON.stringify(message),
    });
    const text = await res.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      body = text;
    }

    if (opts.out) {
      lines.push(JSON.stringify({ messageId: message.id, status: res.status, response: body }));
      if (res.ok && isTriageResponse(body)) {
        tally(categories, body.output.major_category);
        tally(actionKeys, body.output.sub_action_key);
      } else {
        failures++;
      }
    } else {
      console.log(`${message.id}: ${res.status}`);
      console.log(JSON.stringify(body, null, 2));
    }
  }

  if (opts.out) {
    await writeFile(opts.out, lines.length ? `${lines.join("\n")}\n` : "", "utf8");
    console.log(`Wrote ${lines.length} response(s) to ${opts.out} (${failures} failed)`);
    printDistribution("Major categories", categories);
    printDistribution("Sub-action keys", actionKeys);
  }
}

async function enqueue(file: string): Promise<void> {
  const messages = await readMessages(file);
  try {
    for (const message of messages) {
      const jobId = await addTriageJob(message);
      console.log(`Enqueued ${jobId}`);
    }
  } finally {
    await closeTriageQueue();
    await closeRedisConnection();
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "help" || command === "--help") {
    printUsage();
    return;
  }

  const file = args[1];
  if (!file || file.startsWith("--")) {
    console.error(`Usage: ${command} <file>`);
    process.exit(1);
  }

  switch (command) {
    case "triage":
      await triageLocally(file);
      break;
    case "call":
      await callApi(file, parseArgs(args.slice(2)));
      break;
    case "enqueue":
      await enqueue(file);
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error("CLI error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
