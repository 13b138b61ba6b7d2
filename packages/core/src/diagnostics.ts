/**
 * Diagnostics System for polyeq
 *
 * Structured error codes in the TS custom range, shared by macro
 * diagnostics and thrown expansion errors.
 *
 * @example
 * ```typescript
 * ctx.diagnostic(TS9801)
 *   .at(templateNode)
 *   .withArgs({ missing: 1 })
 *   .help("Close every `<` in the generic parameter list")
 *   .emit();
 * ```
 */

import type * as ts from "typescript";

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 9801-9899 */
  readonly code: number;

  /** Default severity */
  readonly severity: "error" | "warning" | "info";

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;
}

// ============================================================================
// Rich Diagnostic
// ============================================================================

export interface RichDiagnostic {
  code: number;
  severity: "error" | "warning" | "info";

  /** Primary message (with placeholders interpolated) */
  message: string;

  /** The primary span (main error location) */
  primarySpan?: {
    node: ts.Node;
    sourceFile: ts.SourceFile;
  };

  notes: string[];

  /** Help text (actionable suggestion in prose) */
  help?: string;
}

/**
 * Interpolate `{name}` placeholders in a descriptor's template.
 */
export function interpolate(
  template: string,
  args: Record<string, string | number | undefined>
): string {
  let message = template;
  for (const [key, value] of Object.entries(args)) {
    if (value === undefined) continue;
    message = message.replace(new RegExp(`\\{${key}\\}`, "g"), String(value));
  }
  return message;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string | number | undefined> = {};

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly sourceFile: ts.SourceFile | undefined,
    private readonly emitter: (diagnostic: RichDiagnostic) => void
  ) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      message: descriptor.messageTemplate,
      notes: [],
    };
  }

  /**
   * Set the primary span for this diagnostic.
   */
  at(node: ts.Node): this {
    if (this.sourceFile) {
      this.diagnostic.primarySpan = { node, sourceFile: this.sourceFile };
    }
    return this;
  }

  withArgs(args: Record<string, string | number | undefined>): this {
    Object.assign(this.args, args);
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  /**
   * Finish the diagnostic without emitting it.
   */
  build(): RichDiagnostic {
    return {
      ...this.diagnostic,
      message: interpolate(this.descriptor.messageTemplate, this.args),
    };
  }

  emit(): void {
    this.emitter(this.build());
  }
}

// ============================================================================
// Error Catalog: eqInterface expansion (9801-9899)
// ============================================================================

export const TS9801: DiagnosticDescriptor = {
  code: 9801,
  severity: "error",
  messageTemplate: "unbalanced generic parameter list: {missing} unclosed `<`",
};

export const TS9802: DiagnosticDescriptor = {
  code: 9802,
  severity: "error",
  messageTemplate: "malformed generic parameter `{param}`",
};

export const TS9803: DiagnosticDescriptor = {
  code: 9803,
  severity: "error",
  messageTemplate: "cannot parse interface path `{path}`: {reason}",
};

export const TS9804: DiagnosticDescriptor = {
  code: 9804,
  severity: "error",
  messageTemplate: "invalid `where` bound `{bound}`: {reason}",
};

export const TS9805: DiagnosticDescriptor = {
  code: 9805,
  severity: "error",
  messageTemplate: "`{macro}` must be used as a top-level statement",
};
