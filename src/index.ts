#!/usr/bin/env node
/**
 * PortLang - Main entry point
 */

import { CLI } from './cli';

export async function main(args: string[]): Promise<number> {
  const cli = new CLI();
  return await cli.run(args);
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

// Export for library use
export * from './types';
export { compile, Compiler, hasBlockingErrors } from './compiler';
export type { CompilerOptions } from './compiler';
export { DiagnosticCollector } from './diagnostic-collector';
export { PortfolioLexer, KEYWORDS } from './lexer';
export { PortfolioParser, ParserFault } from './parser';
export { SemanticValidator } from './semantic-validator';
export { TextReportRenderer } from './report-renderer';
export { computeMetrics, recommend, riskExposure, normalizeProfile } from './portfolio-metrics';
export { DEFAULT_THRESHOLDS, loadThresholds, resolveThresholds } from './config';
export { OutputFormatter } from './output-formatter';
export { CLI, serializeDocument } from './cli';
