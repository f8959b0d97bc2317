#!/usr/bin/env -S npx tsx
import "dotenv/config";
import { askQuestion, confirm } from "../utils/prompt";
import { runCli } from "./commands";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2), {
    env: process.env,
    interactive: process.stdin.isTTY === true,
    ask: askQuestion,
    confirm,
  });
}

void main();
