/**
 * Diagnostics System for strata
 *
 * Structured error codes with message templates and long-form explanations.
 * Engine conditions that cannot be expressed through an effect value are
 * raised as a `StrataError` carrying the catalog entry that produced it.
 *
 * @example
 * ```typescript
 * throw new StrataError(S1001, { left: "Mul", right: "Num" });
 * // error[S1001]: Cannot zip attributed terms of different shapes (Mul vs Num)
 * ```
 */

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Shape = "shape",
  Rewrite = "rewrite",
  Configuration = "config",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code */
  readonly code: number;

  readonly severity: "error" | "warning" | "info";

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation shown by `formatDiagnostic(..., { explain: true })` */
  readonly explanation: string;
}

export type DiagnosticArgs = Readonly<Record<string, string | number | undefined>>;

/**
 * Interpolate a message template with the provided arguments.
 * Placeholders without a matching argument are left in place.
 */
export function interpolate(template: string, args: DiagnosticArgs): string {
  let message = template;
  for (const [key, value] of Object.entries(args)) {
    if (value === undefined) continue;
    message = message.replace(new RegExp(`\\{${key}\\}`, "g"), String(value));
  }
  return message;
}

// ============================================================================
// Error Catalog: Shapes (1001-1099)
// ============================================================================

export const S1001: DiagnosticDescriptor = {
  code: 1001,
  severity: "error",
  category: DiagnosticCategory.Shape,
  messageTemplate: "Cannot zip attributed terms of different shapes ({left} vs {right})",
  explanation: `Zipping two attributed terms pairs their attributes node by node.
Both terms must have been built over the same underlying term, so every
layer has the same number of children at the same positions.

Annotate the same term twice instead of zipping unrelated annotations.`,
};

export const S1002: DiagnosticDescriptor = {
  code: 1002,
  severity: "error",
  category: DiagnosticCategory.Shape,
  messageTemplate: "Layer has {expected} children but {actual} replacements were supplied",
  explanation: `Rebuilding a layer from a list of children requires exactly one
replacement per child position. A mismatch means the shape's map and fold
visit a different number of children, which breaks the shape contract.`,
};

// ============================================================================
// Error Catalog: Rewrites (1101-1199)
// ============================================================================

export const S1101: DiagnosticDescriptor = {
  code: 1101,
  severity: "error",
  category: DiagnosticCategory.Rewrite,
  messageTemplate: "Rewrite did not reach a fixpoint within {limit} steps",
  explanation: `\`repeatedly\` applies a partial rewrite until it declines to fire.
A rewrite that always fires (for example one that maps Num(n) to Num(n + 1))
never terminates. The step limit is read from the \`rewrite.limit\` setting.`,
};

// ============================================================================
// Error Catalog: Configuration (1201-1299)
// ============================================================================

export const S1201: DiagnosticDescriptor = {
  code: 1201,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "Invalid value {value} for `{key}`: expected {expected}",
  explanation: `Configuration is read from STRATA_* environment variables, config.set()
and config files such as .stratarc.json. Numeric settings must be integers.`,
};

export const ALL_DIAGNOSTICS: readonly DiagnosticDescriptor[] = [S1001, S1002, S1101, S1201];

/**
 * Look up a catalog entry by its numeric code.
 */
export function getDiagnostic(code: number): DiagnosticDescriptor | undefined {
  return ALL_DIAGNOSTICS.find((d) => d.code === code);
}

// ============================================================================
// StrataError
// ============================================================================

/**
 * Error raised for engine conditions listed in the catalog.
 */
export class StrataError extends Error {
  readonly code: number;

  constructor(
    readonly descriptor: DiagnosticDescriptor,
    readonly args: DiagnosticArgs = {}
  ) {
    super(interpolate(descriptor.messageTemplate, args));
    this.name = "StrataError";
    this.code = descriptor.code;
  }
}

export function isStrataError(error: unknown): error is StrataError {
  return error instanceof StrataError;
}

// ============================================================================
// Rendering
// ============================================================================

export interface FormatOptions {
  /** Append the catalog explanation */
  explain?: boolean;
}

/**
 * Render an error in `severity[S1234]: message` form.
 */
export function formatDiagnostic(error: StrataError, options: FormatOptions = {}): string {
  const header = `${error.descriptor.severity}[S${error.code}]: ${error.message}`;
  if (!options.explain) {
    return header;
  }
  return `${header}\n\n${error.descriptor.explanation}`;
}
