/**
 * Diagnostic Collector - Accumulates diagnostics for a single compilation
 */

import { Diagnostic, DiagnosticSeverity } from './types';

export class DiagnosticCollector {
  private readonly errorBucket: Diagnostic[] = [];
  private readonly warningBucket: Diagnostic[] = [];
  private readonly infoBucket: Diagnostic[] = [];

  /**
   * Record a diagnostic in the bucket matching its severity
   */
  add(diagnostic: Diagnostic): void {
    switch (diagnostic.severity) {
      case DiagnosticSeverity.ERROR:
        this.errorBucket.push(diagnostic);
        break;
      case DiagnosticSeverity.WARNING:
        this.warningBucket.push(diagnostic);
        break;
      case DiagnosticSeverity.INFO:
        this.infoBucket.push(diagnostic);
        break;
    }
  }

  /**
   * Whether any blocking (error-severity) diagnostic was recorded.
   * Downstream consumers such as report rendering gate on this alone.
   */
  hasErrors(): boolean {
    return this.errorBucket.length > 0;
  }

  errorCount(): number {
    return this.errorBucket.length;
  }

  get errors(): readonly Diagnostic[] {
    return this.errorBucket;
  }

  get warnings(): readonly Diagnostic[] {
    return this.warningBucket;
  }

  get infos(): readonly Diagnostic[] {
    return this.infoBucket;
  }

  /**
   * Errors, then warnings, then infos; insertion order within each
   */
  all(): Diagnostic[] {
    return [...this.errorBucket, ...this.warningBucket, ...this.infoBucket];
  }
}
