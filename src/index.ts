#!/usr/bin/env node

/**
 * Parts Search MCP Server Entry Point
 *
 * Run with: npx tsx src/index.ts
 * Or after build: node dist/index.js
 *
 * CLI flags:
 *   --version, -v                        Print version and exit
 *   --help, -h                           Show help
 *   --build-catalog <dataDir> <dbPath>   Build the local catalog and exit
 */

import { handleBuildCatalog, printHelp, printVersion } from "./cli/commands.js";
import { runServer } from "./server.js";

const main = async (): Promise<void> => {
  const args = process.argv.slice(2);

  // Handle --version / -v
  if (args.includes("--version") || args.includes("-v")) {
    printVersion();
    return;
  }

  // Handle --help / -h
  if (args.includes("--help") || args.includes("-h")) {
    printHelp();
    return;
  }

  if (args.includes("--build-catalog")) {
    process.exitCode = await handleBuildCatalog(args);
    return;
  }

  await runServer();
};

main().catch((error) => {
  console.error("Server error:", error);
  process.exit(1);
});
