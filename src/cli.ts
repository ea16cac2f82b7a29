/**
 * CLI Interface - Main command-line interface
 */

import * as fs from 'fs';
import { CLIOptions, CompileResult, DiagnosticSeverity, PortfolioDocument, ValidationThresholds } from './types';
import { Compiler, hasBlockingErrors } from './compiler';
import { PortfolioLexer } from './lexer';
import { DiagnosticCollector } from './diagnostic-collector';
import { TextReportRenderer } from './report-renderer';
import { OutputFormatter } from './output-formatter';
import { DEFAULT_THRESHOLDS, loadThresholds } from './config';

export const VERSION = '1.0.0';

/**
 * Plain JSON shape of a document; the allocation map becomes an object
 * keyed by asset class in declaration order
 */
export function serializeDocument(document: PortfolioDocument): Record<string, unknown> {
  return {
    configuration: { ...document.configuration },
    allocation: Object.fromEntries(document.allocation),
    restrictions: { ...document.restrictions },
    rebalance: { ...document.rebalance }
  };
}

export class CLI {
  private readonly formatter = new OutputFormatter();

  /**
   * Main entry point for CLI
   *
   * Parses arguments and routes to appropriate handler:
   * - check: Compile and validate a portfolio file
   * - report: Compile and, when valid, render a text report
   * - tokens: Print the token stream of a portfolio file
   */
  async run(args: string[]): Promise<number> {
    try {
      // Handle help flag
      if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
        this.displayUsage();
        return args.length === 0 ? 1 : 0;
      }

      // Handle version flag
      if (args[0] === '--version' || args[0] === '-v' || args[0] === 'version') {
        console.log(`portlang v${VERSION}`);
        return 0;
      }

      const [subcommand, ...rest] = args;

      switch (subcommand) {
        case 'check':
          return this.handleCheck(this.parseArgs(subcommand, rest));
        case 'report':
          return this.handleReport(this.parseArgs(subcommand, rest));
        case 'tokens':
          return this.handleTokens(this.parseArgs(subcommand, rest));
        default:
          throw new Error(`Unknown command: ${subcommand}. Run "portlang --help" for usage.`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      return 1;
    }
  }

  /**
   * Parse the arguments following a subcommand
   *
   * Supports (tokens takes none of them):
   * - --config <path>: JSON file overriding validation thresholds
   * - --output <path>: Write the report to a file (report)
   * - --json: Print the result as JSON (check)
   * - --verbose: Print the source size and diagnostic counts
   */
  private parseArgs(subcommand: string, args: string[]): CLIOptions {
    let file: string | undefined;
    const options: Omit<CLIOptions, 'file'> = { json: false, verbose: false };

    const compiles = subcommand !== 'tokens';

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--verbose' && compiles) {
        options.verbose = true;
      } else if (arg === '--json' && subcommand === 'check') {
        options.json = true;
      } else if (arg === '--config' && compiles) {
        if (i + 1 >= args.length) {
          throw new Error('--config requires a path argument');
        }
        options.configPath = args[++i];
      } else if (arg === '--output' && subcommand === 'report') {
        if (i + 1 >= args.length) {
          throw new Error('--output requires a path argument');
        }
        options.outputPath = args[++i];
      } else if (arg.startsWith('--')) {
        throw new Error(`Unknown flag: ${arg}`);
      } else if (file === undefined) {
        file = arg;
      } else {
        throw new Error(`Unexpected argument: ${arg}`);
      }
    }

    if (file === undefined) {
      throw new Error(`${subcommand} command requires a file argument`);
    }

    return { file, ...options };
  }

  private displayUsage(): void {
    console.log(`
PortLang - Compiler for declarative investment portfolio files

Usage:
  portlang check <file> [flags]     Compile and validate a portfolio
  portlang report <file> [flags]    Compile and print a report when valid
  portlang tokens <file>            Print the token stream

Flags:
  --config <path>                   JSON file overriding validation thresholds
  --output <path>                   Write the report to a file (report only)
  --json                            Print document and diagnostics as JSON (check only)
  --verbose                         Print source size and diagnostic counts

Examples:
  portlang check carteira.port
  portlang check carteira.port --json
  portlang report carteira.port --output relatorio.md
    `.trim());
  }

  private readSource(file: string): string {
    if (!fs.existsSync(file)) {
      throw new Error(`File not found: ${file}`);
    }
    return fs.readFileSync(file, 'utf-8');
  }

  private resolveThresholds(options: CLIOptions): ValidationThresholds {
    return options.configPath !== undefined ? loadThresholds(options.configPath) : DEFAULT_THRESHOLDS;
  }

  private compileVerbose(compiler: Compiler, source: string, options: CLIOptions): CompileResult {
    if (options.verbose) {
      this.formatter.displayInfo(`Compiling ${options.file} (${source.length} characters)`);
    }

    const result = compiler.compile(source);

    if (options.verbose) {
      const errors = result.diagnostics.filter(d => d.severity === DiagnosticSeverity.ERROR).length;
      const warnings = result.diagnostics.filter(d => d.severity === DiagnosticSeverity.WARNING).length;
      this.formatter.displayInfo(`Compiled with ${errors} error(s) and ${warnings} warning(s)`);
    }
    return result;
  }

  /**
   * Handle check command - compile, validate and print diagnostics
   * Exit code 1 when any blocking error was raised.
   */
  private handleCheck(options: CLIOptions): number {
    const source = this.readSource(options.file);
    const compiler = new Compiler({ thresholds: this.resolveThresholds(options) });
    const result = this.compileVerbose(compiler, source, options);
    const valid = !hasBlockingErrors(result.diagnostics);

    if (options.json) {
      console.log(JSON.stringify({
        valid,
        document: result.document !== null ? serializeDocument(result.document) : null,
        diagnostics: result.diagnostics
      }, null, 2));
    } else {
      this.formatter.displayResult(options.file, result.diagnostics);
    }

    return valid ? 0 : 1;
  }

  /**
   * Handle report command - render only when compilation has no blocking errors
   */
  private handleReport(options: CLIOptions): number {
    const source = this.readSource(options.file);
    const thresholds = this.resolveThresholds(options);
    const compiler = new Compiler({
      thresholds,
      renderer: new TextReportRenderer({ thresholds })
    });

    const result = this.compileVerbose(compiler, source, options);
    if (hasBlockingErrors(result.diagnostics)) {
      this.formatter.displayResult(options.file, result.diagnostics);
      this.formatter.displayWarning('Report not generated because of the errors above');
      return 1;
    }

    const rendered = compiler.render(result);
    const diagnostics = [...result.diagnostics, ...rendered.diagnostics];

    if (rendered.report === null) {
      this.formatter.displaySummary(diagnostics);
      return 1;
    }

    if (options.outputPath !== undefined) {
      fs.writeFileSync(options.outputPath, rendered.report, 'utf-8');
      this.formatter.displaySuccess(`Report written to ${options.outputPath}`);
    } else {
      process.stdout.write(rendered.report);
    }

    // Warnings do not block the report; verbose runs still show them
    if (options.verbose) {
      this.formatter.displaySummary(diagnostics);
    }
    return 0;
  }

  /**
   * Handle tokens command - print the token stream, then any lexical diagnostics
   */
  private handleTokens(options: CLIOptions): number {
    const source = this.readSource(options.file);
    const diagnostics = new DiagnosticCollector();
    const tokens = new PortfolioLexer(diagnostics).tokenize(source);

    this.formatter.displayTokens(tokens);
    this.formatter.displaySummary(diagnostics.all());

    return diagnostics.hasErrors() ? 1 : 0;
  }
}
