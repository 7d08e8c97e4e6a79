#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";
import { setupLogging, log, logError, flushLogs, errorMessage } from "./logging.js";
import { createToolContext } from "./tools.js";

// stdout carries the protocol; logs go to stderr and the log file
setupLogging();

let stopping = false;

async function shutdown(reason: string, exitCode: number = 0): Promise<void> {
  if (stopping) return;
  stopping = true;
  log(`Shutting down: ${reason}`, "info");
  await flushLogs();
  process.exit(exitCode);
}

process.on("uncaughtException", (error: Error) => {
  logError(error, "Uncaught exception");
});

process.on("unhandledRejection", (reason: unknown) => {
  logError(reason instanceof Error ? reason : new Error(String(reason)), "Unhandled rejection");
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => void shutdown(`${signal} received`));
}

// The client closing its end of the pipe ends the session
process.stdin.on("end", () => void shutdown("stdin ended"));

async function main(): Promise<void> {
  // Configuration errors fail startup here rather than on the first tool call
  const context = createToolContext();
  const server = createServer(context);

  server.onclose = () => void shutdown("connection closed");
  server.onerror = (error) => logError(error, "Protocol error");

  await server.connect(new StdioServerTransport());
  log("Account plan research server ready", "info", {
    pid: process.pid,
    planFile: context.config.storage.planFile,
    llm: context.config.llm.mock ? "mock" : context.config.llm.provider,
  });
}

main().catch((error: unknown) => {
  log(`Startup failed: ${errorMessage(error)}`, "error");
  void shutdown("startup failure", 1);
});
