// SPDX-License-Identifier: MIT
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Development-only logging. Every entry point is a no-op in production and
 * when logging is switched off through {@link setLoggingConfig}.
 * @module
 */

import { environment } from "./environment.ts";
import { getLoggingConfig } from "./config.ts";
import { sanitizeErrorForLogs } from "./errors.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

const SAFE_COMPONENT_REGEX = /^[\w:.-]{1,64}$/u;
const MAX_MESSAGE_LENGTH = 512;
const MAX_CONTEXT_STRING_LENGTH = 1_024;

export function sanitizeComponentName(name: string): string {
  if (!SAFE_COMPONENT_REGEX.test(name)) return "unsafe-component-name";
  if (name.startsWith(".") || name.endsWith(".")) {
    return "unsafe-component-name";
  }
  return name;
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...[TRUNC]` : value;
}

function serializeContext(context: unknown): string {
  if (context === undefined) return "";
  // Errors have no enumerable fields; log their bounded summary instead.
  const value = context instanceof Error ? sanitizeErrorForLogs(context) : context;
  try {
    const serialized = JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "string" ? truncate(v, MAX_CONTEXT_STRING_LENGTH) : v,
    );
    return serialized ?? "";
  } catch {
    // Circular or otherwise unserializable context.
    return String(context);
  }
}

/**
 * Writes one formatted line to the console method matching `level`.
 * @param component The component or module logging the message.
 * @param context Optional structured detail, serialized as JSON.
 */
export function devLog(
  level: LogLevel,
  component: string,
  message: string,
  context?: unknown,
): void {
  if (environment.isProduction) return;
  if (!getLoggingConfig().enabled) return;

  const safeComponent = sanitizeComponentName(component);
  const safeMessage = truncate(message, MAX_MESSAGE_LENGTH);
  const contextString = serializeContext(context);
  const line = `[${level.toUpperCase()}] (${safeComponent}) ${safeMessage}`;
  const out = contextString ? `${line} | context=${contextString}` : line;
  switch (level) {
    case "debug":
      console.debug(out);
      break;
    case "info":
      console.info(out);
      break;
    case "warn":
      console.warn(out);
      break;
    case "error":
      console.error(out);
      break;
  }
}

export type Logger = {
  readonly debug: (message: string, context?: unknown) => void;
  readonly info: (message: string, context?: unknown) => void;
  readonly warn: (message: string, context?: unknown) => void;
  readonly error: (message: string, context?: unknown) => void;
  readonly child: (sub: string) => Logger;
};

/**
 * Creates a logger instance for a specific component.
 * @param component The component name for logging.
 * @returns A logger object with methods for different log levels.
 */
export function createLogger(component: string): Logger {
  const log = (level: LogLevel, message: string, context?: unknown) => {
    devLog(level, component, message, context);
  };
  return {
    debug: (message: string, context?: unknown) =>
      log("debug", message, context),

    info: (message: string, context?: unknown) => log("info", message, context),

    warn: (message: string, context?: unknown) => log("warn", message, context),

    error: (message: string, context?: unknown) =>
      log("error", message, context),

    child: (sub: string) => createLogger(`${component}:${sub}`),
  };
}
