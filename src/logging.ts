import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';

export type LogLevel = "debug" | "info" | "warning" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

let logDir: string = "";
let logFile: string = "";

// Async log buffer to prevent blocking the event loop
let logBuffer: string[] = [];
let flushTimeout: ReturnType<typeof setTimeout> | null = null;
let isWriting = false;
const FLUSH_INTERVAL_MS = 100; // Flush every 100ms
const MAX_BUFFER_SIZE = 50; // Flush when buffer has 50 entries

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function thresholdLevel(): LogLevel {
  const configured = (process.env.ACCOUNT_PLAN_LOG_LEVEL || "").toLowerCase();
  return isLogLevel(configured) ? configured : "info";
}

export function setupLogging(): void {
  // Create logs directory
  logDir = path.join(process.cwd(), "logs");
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  // Create log file with timestamp
  const timestamp = new Date().toISOString().split('T')[0];
  logFile = path.join(logDir, `account-plan-${timestamp}.log`);

  log("Logging system initialized", "info");
}

/**
 * Async flush of log buffer to file
 * Uses non-blocking file I/O to prevent event loop blocking
 */
async function flushLogBuffer(): Promise<void> {
  if (isWriting || logBuffer.length === 0 || !logFile) {
    return;
  }

  isWriting = true;
  const toWrite = logBuffer.join('');
  logBuffer = [];

  try {
    await fsp.appendFile(logFile, toWrite);
  } catch (error) {
    // stderr only: logging the failure would re-enter the buffer
    console.error(`[logging] could not append to ${logFile}: ${error instanceof Error ? error.message : String(error)}`);
  } finally {
    isWriting = false;
  }
}

/**
 * Schedule async flush of log buffer
 */
function scheduleFlush(): void {
  if (flushTimeout) return;

  flushTimeout = setTimeout(() => {
    flushTimeout = null;
    void flushLogBuffer();
  }, FLUSH_INTERVAL_MS);
}

export function log(message: string, level: LogLevel = "info", data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[thresholdLevel()]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    data
  };

  // stdout carries the MCP protocol, so the terminal copy goes to stderr
  console.error(`[${entry.timestamp}] ${level.toUpperCase()}: ${message}`);
  if (data && level === 'error') {
    // Only log data details for errors to reduce stderr output
    console.error(`  Data: ${JSON.stringify(data, null, 2)}`);
  }

  // Buffer log entries for async file write
  if (logFile) {
    logBuffer.push(JSON.stringify(entry) + '\n');

    // Flush immediately if buffer is full, otherwise schedule
    if (logBuffer.length >= MAX_BUFFER_SIZE) {
      void flushLogBuffer();
    } else {
      scheduleFlush();
    }
  }
}

/**
 * Flush whatever is still buffered. Called on shutdown.
 */
export async function flushLogs(): Promise<void> {
  if (flushTimeout) {
    clearTimeout(flushTimeout);
    flushTimeout = null;
  }
  await flushLogBuffer();
}

export function logRequest(method: string, params: unknown): void {
  log(`Request: ${method}`, "info", { params });
}

export function logResponse(method: string, response: unknown): void {
  log(`Response: ${method}`, "debug", { response });
}

export function logError(error: Error | string, context?: string): void {
  const message = context ? `${context}: ${error}` : String(error);
  log(message, "error", error instanceof Error ? {
    name: error.name,
    message: error.message,
    stack: error.stack
  } : undefined);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
