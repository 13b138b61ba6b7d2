/**
 * TypeScript transformer that expands polyeq macros
 *
 * Usable from any host that accepts `ts.TransformerFactory<ts.SourceFile>`
 * (ts-patch, ttypescript-style programs, `ts.transform` in tests):
 *
 * ```typescript
 * program.emit(undefined, undefined, undefined, false, {
 *   before: [eqTransformerFactory({ verbose: true })],
 * });
 * ```
 */

import * as ts from "typescript";
import {
  config,
  createMacroContext,
  globalRegistry,
  printNode,
  TS9805,
  type MacroContextImpl,
  type MacroRegistry,
  type TaggedTemplateMacroDef,
} from "@polyeq/core";

export interface EqTransformerConfig {
  /** Log each step; defaults to `config.get("verbose")` */
  verbose?: boolean;
  /** Registry to resolve macros from; defaults to the global one */
  registry?: MacroRegistry;
  /** Receives every diagnostic the transformer reports */
  onDiagnostic?: (diagnostic: ts.Diagnostic) => void;
}

interface ImportBinding {
  module: string;
  exportName: string;
  specifier: ts.ImportSpecifier;
}

/** Code for diagnostics that did not come from the catalog. */
const GENERIC_DIAGNOSTIC_CODE = 9800;

export function eqTransformerFactory(
  transformerConfig: EqTransformerConfig = {}
): ts.TransformerFactory<ts.SourceFile> {
  const verbose = transformerConfig.verbose ?? config.get<boolean>("verbose") ?? false;
  const registry = transformerConfig.registry ?? globalRegistry;

  if (verbose) {
    console.log("[polyeq] Initializing transformer");
    console.log(
      `[polyeq] Registered macros: ${registry
        .getAll()
        .map((m) => m.name)
        .join(", ")}`
    );
  }

  return (context: ts.TransformationContext) => {
    return (sourceFile: ts.SourceFile) => {
      if (verbose) {
        console.log(`[polyeq] Processing: ${sourceFile.fileName}`);
      }

      const ctx = createMacroContext(sourceFile, context);
      const transformer = new EqTransformer(ctx, registry, context, verbose);
      const result = transformer.transform(sourceFile);

      for (const diag of ctx.getDiagnostics()) {
        const start = diag.node ? diag.node.getStart(sourceFile) : 0;
        const length = diag.node ? diag.node.getWidth(sourceFile) : 0;

        const tsDiag: ts.Diagnostic = {
          file: sourceFile,
          start,
          length,
          messageText: `[polyeq] ${diag.message}`,
          category:
            diag.severity === "error" ? ts.DiagnosticCategory.Error : ts.DiagnosticCategory.Warning,
          code: diag.code ?? GENERIC_DIAGNOSTIC_CODE,
          source: "polyeq",
        };

        // TS 5.x transformation contexts expose addDiagnostic internally
        if ("addDiagnostic" in context && typeof context.addDiagnostic === "function") {
          context.addDiagnostic(tsDiag);
        }
        transformerConfig.onDiagnostic?.(tsDiag);

        if (verbose) {
          const prefix = diag.severity === "error" ? "ERROR" : "WARNING";
          const loc = diag.node
            ? ` at ${sourceFile.fileName}:${sourceFile.getLineAndCharacterOfPosition(start).line + 1}`
            : "";
          console.log(`[polyeq ${prefix}]${loc} ${diag.message}`);
        }
      }

      return result;
    };
  };
}

/**
 * Expands top-level macro statements of one source file.
 */
class EqTransformer {
  private readonly imports = new Map<string, ImportBinding>();
  private readonly usedSpecifiers = new Set<ts.ImportSpecifier>();

  constructor(
    private readonly ctx: MacroContextImpl,
    private readonly registry: MacroRegistry,
    private readonly context: ts.TransformationContext,
    private readonly verbose: boolean
  ) {}

  transform(sourceFile: ts.SourceFile): ts.SourceFile {
    this.collectImports(sourceFile);

    const hoisted: ts.Statement[] = [];
    const seenImports = new Set<string>();
    const body: ts.Statement[] = [];
    let changed = false;

    for (const stmt of sourceFile.statements) {
      const expanded = this.tryExpandStatement(stmt);
      if (expanded === undefined) {
        this.reportNestedUses(stmt);
        body.push(stmt);
        continue;
      }
      changed = true;

      for (const generated of expanded) {
        if (ts.isImportDeclaration(generated)) {
          const key = printNode(generated);
          if (seenImports.has(key)) continue;
          seenImports.add(key);
          hoisted.push(generated);
        } else {
          body.push(generated);
        }
      }
    }

    if (!changed) return sourceFile;

    return this.ctx.factory.updateSourceFile(sourceFile, [
      ...hoisted,
      ...this.removeMacroImports(body),
    ]);
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  private collectImports(sourceFile: ts.SourceFile): void {
    for (const stmt of sourceFile.statements) {
      if (!ts.isImportDeclaration(stmt) || !ts.isStringLiteral(stmt.moduleSpecifier)) continue;
      const bindings = stmt.importClause?.namedBindings;
      if (!bindings || !ts.isNamedImports(bindings)) continue;

      for (const specifier of bindings.elements) {
        this.imports.set(specifier.name.text, {
          module: stmt.moduleSpecifier.text,
          exportName: (specifier.propertyName ?? specifier.name).text,
          specifier,
        });
      }
    }
  }

  /**
   * Import-scoped macros resolve only through an import of their module;
   * the others also resolve by bare name.
   */
  private resolveMacro(tag: ts.Identifier): TaggedTemplateMacroDef | undefined {
    const binding = this.imports.get(tag.text);
    if (binding) {
      return this.registry.getByModuleExport(binding.module, binding.exportName);
    }
    if (this.registry.isImportScoped(tag.text)) return undefined;
    return this.registry.getTaggedTemplate(tag.text);
  }

  // -------------------------------------------------------------------------
  // Expansion
  // -------------------------------------------------------------------------

  private tryExpandStatement(stmt: ts.Statement): ts.Statement[] | undefined {
    if (!ts.isExpressionStatement(stmt) || !ts.isTaggedTemplateExpression(stmt.expression)) {
      return undefined;
    }
    const node = stmt.expression;
    if (!ts.isIdentifier(node.tag)) return undefined;

    const tagName = node.tag.text;
    const macro = this.resolveMacro(node.tag);
    if (!macro) return undefined;

    if (this.verbose) {
      console.log(`[polyeq] Expanding tagged template macro: ${tagName}`);
    }

    if (macro.validate && !macro.validate(this.ctx, node)) {
      return [stmt];
    }

    const reportedBefore = this.ctx.getDiagnostics().length;
    let result: ts.Statement[];
    try {
      result = macro.expand(this.ctx, node);
    } catch (error) {
      this.ctx.reportError(node, `Tagged template macro '${tagName}' expansion failed: ${String(error)}`);
      return [stmt];
    }

    // A failed expansion keeps the statement, and with it the import
    const failed = this.ctx
      .getDiagnostics()
      .slice(reportedBefore)
      .some((d) => d.severity === "error");
    const binding = this.imports.get(tagName);
    if (binding && !failed) this.usedSpecifiers.add(binding.specifier);
    return result;
  }

  private reportNestedUses(root: ts.Node): void {
    const visit = (node: ts.Node): void => {
      if (ts.isTaggedTemplateExpression(node) && ts.isIdentifier(node.tag)) {
        const macro = this.resolveMacro(node.tag);
        if (macro) {
          this.ctx.diagnostic(TS9805).at(node).withArgs({ macro: macro.name }).emit();
        }
      }
      ts.forEachChild(node, visit);
    };
    visit(root);
  }

  // -------------------------------------------------------------------------
  // Import cleanup
  // -------------------------------------------------------------------------

  /**
   * Drop import specifiers whose every use was expanded away, and the whole
   * declaration when nothing else remains in it.
   */
  private removeMacroImports(statements: ts.Statement[]): ts.Statement[] {
    const factory = this.ctx.factory;
    const result: ts.Statement[] = [];

    for (const stmt of statements) {
      const clause = ts.isImportDeclaration(stmt) ? stmt.importClause : undefined;
      const bindings = clause?.namedBindings;
      if (!ts.isImportDeclaration(stmt) || !clause || !bindings || !ts.isNamedImports(bindings)) {
        result.push(stmt);
        continue;
      }

      const remaining = bindings.elements.filter((specifier) => !this.usedSpecifiers.has(specifier));
      if (remaining.length === bindings.elements.length) {
        result.push(stmt);
        continue;
      }

      const moduleSpec = ts.isStringLiteral(stmt.moduleSpecifier)
        ? stmt.moduleSpecifier.text
        : "<unknown>";

      if (remaining.length === 0 && clause.name === undefined) {
        if (this.verbose) {
          console.log(`[polyeq] Removing macro-only import: import ... from "${moduleSpec}"`);
        }
        continue;
      }

      const newClause = ts.visitEachChild(
        clause,
        (child) =>
          child === bindings && remaining.length > 0
            ? factory.updateNamedImports(bindings, remaining)
            : child === bindings
              ? undefined
              : child,
        this.context
      );

      if (this.verbose) {
        console.log(`[polyeq] Trimmed macro specifiers from import: "${moduleSpec}"`);
      }

      result.push(
        factory.updateImportDeclaration(
          stmt,
          stmt.modifiers,
          newClause,
          stmt.moduleSpecifier,
          stmt.attributes
        )
      );
    }

    return result;
  }
}
