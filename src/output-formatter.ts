/**
 * OutputFormatter - Handles console output formatting for PortLang
 *
 * Provides consistent feedback to users with:
 * - Diagnostic summaries grouped by severity (❌ errors, ⚠️ warnings, ℹ️ infos)
 * - Per-diagnostic code, location and suggestion lines
 * - Status messages for each command
 */

import { Diagnostic, DiagnosticSeverity, Token } from './types';

export class OutputFormatter {
  /**
   * Format one diagnostic as a bullet line, plus a suggestion line when present
   */
  formatDiagnostic(diagnostic: Diagnostic): string {
    const location = diagnostic.location
      ? ` (line ${diagnostic.location.line}, column ${diagnostic.location.column})`
      : '';
    const lines = [`  • [${diagnostic.code}] ${diagnostic.message}${location}`];
    if (diagnostic.suggestion) {
      lines.push(`    💡 Suggestion: ${diagnostic.suggestion}`);
    }
    return lines.join('\n');
  }

  /**
   * Display all diagnostics grouped by severity.
   * Errors go to stderr, everything else to stdout.
   */
  displaySummary(diagnostics: readonly Diagnostic[]): void {
    const errors = diagnostics.filter(d => d.severity === DiagnosticSeverity.ERROR);
    const warnings = diagnostics.filter(d => d.severity === DiagnosticSeverity.WARNING);
    const infos = diagnostics.filter(d => d.severity === DiagnosticSeverity.INFO);

    if (errors.length > 0) {
      console.error([`❌ ${errors.length} error(s):`, ...errors.map(d => this.formatDiagnostic(d))].join('\n'));
    }
    if (warnings.length > 0) {
      console.log([`⚠️  ${warnings.length} warning(s):`, ...warnings.map(d => this.formatDiagnostic(d))].join('\n'));
    }
    if (infos.length > 0) {
      console.log([`ℹ️  ${infos.length} info message(s):`, ...infos.map(d => this.formatDiagnostic(d))].join('\n'));
    }
  }

  /**
   * Display the outcome of a check
   */
  displayResult(file: string, diagnostics: readonly Diagnostic[]): void {
    const errorCount = diagnostics.filter(d => d.severity === DiagnosticSeverity.ERROR).length;
    if (errorCount === 0) {
      console.log(`✅ VALID: ${file}`);
    } else {
      console.error(`🚫 INVALID: ${file}`);
    }
    this.displaySummary(diagnostics);
  }

  /**
   * One token per line: position, kind and value
   */
  displayTokens(tokens: readonly Token[]): void {
    const lines = tokens.map(token => {
      const position = `${token.line}:${token.column}`.padEnd(8);
      const value = token.value === null ? '' : ` ${JSON.stringify(token.value)}`;
      return `${position}${token.kind}${value}`;
    });
    console.log(lines.join('\n'));
  }

  displayWarning(message: string): void {
    console.warn(`⚠️  Warning: ${message}`);
  }

  displayInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }

  displaySuccess(message: string): void {
    console.log(`✅ ${message}`);
  }
}
