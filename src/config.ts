import dotenv from "dotenv";
import { LOG_LEVELS, type AppConfig, type LogLevel } from "./types.js";

// Load environment variables
dotenv.config();

const GMAIL_MAX_PAGE_SIZE = 500;
const GMAIL_MAX_BATCH_SIZE = 1000;

/**
 * Read a non-negative integer from the environment
 */
function readCount(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = (env.LOG_LEVEL || "info").toLowerCase();
  if (!isLogLevel(raw)) {
    throw new Error(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${env.LOG_LEVEL}"`
    );
  }
  return raw;
}

/**
 * Application configuration loaded from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const listPageSize = readCount(env, "LIST_PAGE_SIZE", 100);
  const mutationBatchSize = readCount(env, "MUTATION_BATCH_SIZE", 1000);

  return {
    rulesFile: env.RULES_FILE || "data/rules.json",
    gmailCredentialsFile: env.GMAIL_CREDENTIALS_FILE || "credentials.json",
    gmailTokenFile: env.GMAIL_TOKEN_FILE || "data/token.json",
    scanLimit: readCount(env, "SCAN_LIMIT", 0),
    listPageSize: Math.min(Math.max(listPageSize, 1), GMAIL_MAX_PAGE_SIZE),
    mutationBatchSize: Math.min(
      Math.max(mutationBatchSize, 1),
      GMAIL_MAX_BATCH_SIZE
    ),
    maxRetries: readCount(env, "MAX_RETRIES", 3),
    logLevel: readLogLevel(env),
  };
}

/**
 * Leveled console logger
 */
export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = "info") {
    this.level = level;
  }

  private shouldLog(messageLevel: LogLevel): boolean {
    return LOG_LEVELS.indexOf(messageLevel) >= LOG_LEVELS.indexOf(this.level);
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.debug(this.formatMessage("debug", message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(this.formatMessage("info", message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("warn", message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(this.formatMessage("error", message), ...args);
    }
  }
}

export const config = loadConfig();
export const logger = new Logger(config.logLevel);
