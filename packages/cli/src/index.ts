#!/usr/bin/env node
import "dotenv/config";
import { CommanderError } from "commander";
import { errorMessage } from "@wardline/schemas";
import { ConfigError } from "./config.js";
import { CliError, createProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[wardline] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[wardline] Uncaught exception:", err);
  process.exit(1);
});

const program = createProgram({
  out: (line) => console.log(line),
  env: process.env,
  onServing: (runtime, server) => {
    let stopping = false;
    const shutdown = async (): Promise<void> => {
      if (stopping) return;
      stopping = true;
      console.log("\nShutting down...");
      await server.shutdown();
      await runtime.close();
      process.exit(0);
    };
    const onSignal = (): void => {
      shutdown().catch((err: unknown) => {
        console.error("[wardline] Shutdown failed:", errorMessage(err));
        process.exit(1);
      });
    };
    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
  },
});

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (err) {
  if (err instanceof CommanderError) {
    // --help and --version end here too
    process.exit(err.exitCode);
  }
  if (err instanceof CliError || err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error("[wardline] Command failed:", errorMessage(err));
  }
  process.exit(1);
}
