/**
 * Core module exports for @strata/core
 *
 * This package provides:
 * - Configuration (defaults, config files, config.set(), STRATA_* env vars)
 * - The diagnostics catalog and StrataError
 * - Scoped logging
 */

// Configuration System
export {
  config,
  type StrataConfig,
  type RewriteConfig,
  type RenderConfig,
  type LawsConfig,
} from "./config.js";

// Diagnostics
export {
  DiagnosticCategory,
  StrataError,
  isStrataError,
  interpolate,
  formatDiagnostic,
  getDiagnostic,
  ALL_DIAGNOSTICS,
  S1001,
  S1002,
  S1101,
  S1201,
  type DiagnosticDescriptor,
  type DiagnosticArgs,
  type FormatOptions,
} from "./diagnostics.js";

// Logging
export { createLogger, formatLogLine, type Logger, type LoggerOptions, type LogLevel } from "./logger.js";
