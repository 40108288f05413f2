#!/usr/bin/env node
import { runCli } from "./program.js";

async function main() {
  process.exitCode = await runCli({
    args: process.argv.slice(2),
    cwd: process.cwd(),
    env: process.env,
    interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
  });
}

void main();
