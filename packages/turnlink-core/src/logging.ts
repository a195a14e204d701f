// Logging for turnlink sessions.
//
// Provides exchange logging with timing information.
// Uses the DEBUG environment variable pattern matching (like npm's debug package).

import { ExchangeKey, type SessionMiddleware, type ExchangeContext, type Exchange, type ExchangeOutcome } from "./middleware.ts";
import { NetcodeError } from "./errors.ts";

const START_TIME = new ExchangeKey<number>("logging:start-time");

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "turnlink:session".
   * Logging is enabled when DEBUG matches this namespace.
   * Supports patterns like "turnlink:*" or "*".
   */
  namespace?: string;

  /**
   * Log frame payloads as hex. Defaults to false.
   */
  logPayloads?: boolean;

  /**
   * Minimum duration (ms) to log a completed exchange. Defaults to 0.
   * Receives include the time spent waiting for the opponent.
   */
  minDuration?: number;
}

/**
 * Check if a namespace is enabled based on the DEBUG pattern.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string): boolean {
  const debug = typeof process === "undefined" ? undefined : process.env.DEBUG;
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Log a structured event under `namespace` if DEBUG enables it.
 */
export function debugLog(namespace: string, message: string, data?: Record<string, unknown>): void {
  if (!isEnabled(namespace)) return;
  if (data) {
    console.log(`[${namespace}] ${message}`, data);
  } else {
    console.log(`[${namespace}] ${message}`);
  }
}

/** Render bytes as lowercase hex. */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
}

/**
 * Create a logging middleware that logs every exchange with timing information.
 * Logging is controlled by DEBUG (like npm's debug package).
 *
 * ```sh
 * DEBUG='turnlink:*' node game.js         # all turnlink logging
 * DEBUG='turnlink:session' node game.js   # only exchanges
 * ```
 *
 * Logs structured objects to the console:
 * - Before: { type: "exchange", direction, sequence, payload? }
 * - After: { type: "outcome", direction, sequence, duration, ok, payload?, error? }
 *
 * @example
 * ```typescript
 * const session = await establishSession(channel, ConnectionSide.Initiator, {
 *   frameSize: 4,
 *   middleware: [loggingMiddleware({ logPayloads: true })],
 * });
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): SessionMiddleware {
  const namespace = options.namespace ?? "turnlink:session";
  const logPayloads = options.logPayloads ?? false;
  const minDuration = options.minDuration ?? 0;

  return {
    pre(ctx: ExchangeContext, exchange: Exchange): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "exchange",
        direction: exchange.direction,
        sequence: exchange.sequence,
      };
      if (logPayloads && exchange.payload) {
        logObj.payload = toHex(exchange.payload);
      }

      console.log(`→ ${exchange.direction} #${exchange.sequence}`, logObj);
    },

    post(ctx: ExchangeContext, exchange: Exchange, outcome: ExchangeOutcome): void {
      const startTime = ctx.extensions.get(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      if (!isEnabled(namespace)) return;

      const label = `${exchange.direction} #${exchange.sequence}`;
      const logObj: Record<string, unknown> = {
        type: "outcome",
        direction: exchange.direction,
        sequence: exchange.sequence,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        logObj.ok = true;
        if (logPayloads) {
          logObj.payload = toHex(outcome.payload);
        }
        console.log(`← ${label}: ✓ ${duration.toFixed(2)}ms`, logObj);
        return;
      }

      logObj.ok = false;
      const error = outcome.error;
      if (error instanceof NetcodeError) {
        logObj.error = { kind: error.kind, fatal: error.fatal, message: error.message };
      } else {
        logObj.error = { name: error.name, message: error.message };
      }
      console.log(`← ${label}: ✗ ${duration.toFixed(2)}ms`, logObj);
    },
  };
}
