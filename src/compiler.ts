/**
 * Compiler - Orchestrates the lexer, parser and semantic validator
 */

import {
  CompileResult,
  RenderResult,
  ReportRenderer,
  ValidationThresholds,
  Diagnostic,
  DiagnosticCategory,
  DiagnosticSeverity
} from './types';
import { DiagnosticCollector } from './diagnostic-collector';
import { PortfolioLexer } from './lexer';
import { PortfolioParser } from './parser';
import { SemanticValidator } from './semantic-validator';
import { DEFAULT_THRESHOLDS } from './config';

export interface CompilerOptions {
  /** Report capability; rendering is unavailable when omitted */
  renderer?: ReportRenderer;
  thresholds?: ValidationThresholds;
}

export function hasBlockingErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === DiagnosticSeverity.ERROR);
}

export class Compiler {
  private readonly renderer?: ReportRenderer;
  private readonly thresholds: ValidationThresholds;

  constructor(options: CompilerOptions = {}) {
    this.renderer = options.renderer;
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  }

  get canRender(): boolean {
    return this.renderer !== undefined;
  }

  /**
   * Compile source text. Each call uses its own collector and stage instances,
   * so concurrent compilations share nothing.
   */
  compile(sourceText: string): CompileResult {
    const diagnostics = new DiagnosticCollector();

    const tokens = new PortfolioLexer(diagnostics).tokenize(sourceText);
    const document = new PortfolioParser(diagnostics).parse(tokens);

    // A missing document has already been explained by the parser
    if (document !== null) {
      new SemanticValidator(diagnostics, this.thresholds).validate(document);
    }

    return { document, diagnostics: diagnostics.all() };
  }

  /**
   * Render a compiled document. Nothing is rendered while the compile result
   * carries blocking errors.
   */
  render(result: CompileResult): RenderResult {
    if (result.document === null || hasBlockingErrors(result.diagnostics)) {
      return { report: null, diagnostics: [] };
    }

    if (this.renderer === undefined) {
      return {
        report: null,
        diagnostics: [{
          category: DiagnosticCategory.GENERATION,
          severity: DiagnosticSeverity.WARNING,
          code: 'GEN001',
          message: 'Report renderer not available',
          suggestion: 'Construct the compiler with a renderer to produce reports'
        }]
      };
    }

    try {
      return { report: this.renderer.render(result.document), diagnostics: [] };
    } catch (error) {
      return {
        report: null,
        diagnostics: [{
          category: DiagnosticCategory.GENERATION,
          severity: DiagnosticSeverity.ERROR,
          code: 'GEN003',
          message: `Report generation failed: ${error instanceof Error ? error.message : String(error)}`
        }]
      };
    }
  }
}

/**
 * Compile with default thresholds and no report capability
 */
export function compile(sourceText: string): CompileResult {
  return new Compiler().compile(sourceText);
}
