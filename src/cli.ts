#!/usr/bin/env node

/**
 * CLI entry point for ext-sorter
 */

import { runExtensionSorter } from "./index";

async function main() {
  try {
    process.exitCode = await runExtensionSorter(process.argv.slice(2), {
      handleSignals: true,
    });
  } catch (error) {
    console.error("ext-sorter failed:", error);
    process.exitCode = 1;
  }
}

void main();
