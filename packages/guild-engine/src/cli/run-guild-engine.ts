#!/usr/bin/env node
import { failureOutput, runGuildEngine } from "./runner.js";

async function readStdin(): Promise<string> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8").trim();
}

function writeOutput(line: string): void {
  process.stdout.write(line);
}

async function main(): Promise<void> {
  process.exitCode = await runGuildEngine(await readStdin(), { env: process.env, write: writeOutput });
}

main().catch((error: unknown) => {
  writeOutput(`${JSON.stringify(failureOutput(error))}\n`);
  process.exitCode = 1;
});
