/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Meshport Logger - consistent logging across packages
 *
 * Log levels:
 * - error: Always logged - an import failed
 * - warn: Always logged - input was accepted but partly ignored
 * - info: Logged when MESHPORT_DEBUG is set - pipeline stages
 * - debug: Logged when MESHPORT_DEBUG is set - per-entity details
 *
 * Enable debug logging with the MESHPORT_DEBUG=true environment variable.
 */

export interface LogContext {
  /** Component/module name (e.g., 'Parser', 'Assembler', 'PostProcess') */
  component: string;
  /** Operation being performed (e.g., 'readIndices', 'assembleMaterial') */
  operation?: string;
  /** glTF entity kind if applicable (e.g., 'accessors', 'meshes') */
  entity?: string;
  /** Index of the entity inside its collection */
  index?: number;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
  caught(message: string, error: unknown, ctx?: Partial<LogContext>): void;
}

export function isDebugEnabled(): boolean {
  if (typeof process !== 'undefined' && process.env) {
    return process.env.MESHPORT_DEBUG === 'true';
  }
  return false;
}

export function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.entity) {
    prefix += ctx.index !== undefined ? ` ${ctx.entity}[${ctx.index}]` : ` ${ctx.entity}`;
  } else if (ctx.index !== undefined) {
    prefix += ` #${ctx.index}`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string): Logger {
  return {
    /**
     * Log an error - always visible in console
     */
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        if (ctx?.data !== undefined) {
          console.error(`${prefix} ${message}:`, formatError(error), ctx.data);
        } else {
          console.error(`${prefix} ${message}:`, formatError(error));
        }
      } else {
        if (ctx?.data !== undefined) {
          console.error(`${prefix} ${message}`, ctx.data);
        } else {
          console.error(`${prefix} ${message}`);
        }
      }
    },

    /**
     * Log a warning - always visible in console
     * Use when part of the input is ignored
     */
    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /**
     * Log info - only visible when MESHPORT_DEBUG=true
     */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /**
     * Log debug - only visible when MESHPORT_DEBUG=true
     */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log an error that the caller handles itself - visible when MESHPORT_DEBUG=true
     */
    caught(message: string, error: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.debug(`${prefix} ${message} (handled):`, formatError(error), ctx.data);
      } else {
        console.debug(`${prefix} ${message} (handled):`, formatError(error));
      }
    },
  };
}
