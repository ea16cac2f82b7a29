/**
 * Unit tests for OutputFormatter
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { OutputFormatter } from '../../src/output-formatter';
import { Diagnostic, DiagnosticCategory, DiagnosticSeverity, TokenKind } from '../../src/types';

function spyConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {})
  };
}

const MISSING_SEMICOLON: Diagnostic = {
  category: DiagnosticCategory.SYNTACTIC,
  severity: DiagnosticSeverity.ERROR,
  code: 'SYN001',
  message: "Expected ';', found 'perfil'",
  location: { line: 3, column: 5 },
  suggestion: "Insert ';' before 'perfil'"
};

const NO_PROFILE: Diagnostic = {
  category: DiagnosticCategory.SEMANTIC,
  severity: DiagnosticSeverity.WARNING,
  code: 'SEM007',
  message: 'Risk profile not defined'
};

describe('OutputFormatter', () => {
  const formatter = new OutputFormatter();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('formatDiagnostic', () => {
    it('should include code, location and suggestion', () => {
      expect(formatter.formatDiagnostic(MISSING_SEMICOLON)).toBe(
        "  • [SYN001] Expected ';', found 'perfil' (line 3, column 5)\n" +
        "    💡 Suggestion: Insert ';' before 'perfil'"
      );
    });

    it('should omit absent location and suggestion', () => {
      expect(formatter.formatDiagnostic(NO_PROFILE)).toBe('  • [SEM007] Risk profile not defined');
    });
  });

  describe('displaySummary', () => {
    it('should send errors to stderr and warnings to stdout', () => {
      const spies = spyConsole();

      formatter.displaySummary([MISSING_SEMICOLON, NO_PROFILE]);

      expect(spies.error).toHaveBeenCalledOnce();
      expect(spies.error.mock.calls[0][0]).toBe([
        '❌ 1 error(s):',
        "  • [SYN001] Expected ';', found 'perfil' (line 3, column 5)",
        "    💡 Suggestion: Insert ';' before 'perfil'"
      ].join('\n'));
      expect(spies.log).toHaveBeenCalledOnce();
      expect(spies.log.mock.calls[0][0]).toBe('⚠️  1 warning(s):\n  • [SEM007] Risk profile not defined');
    });

    it('should print nothing for no diagnostics', () => {
      const spies = spyConsole();

      formatter.displaySummary([]);

      expect(spies.log).not.toHaveBeenCalled();
      expect(spies.error).not.toHaveBeenCalled();
    });
  });

  describe('displayResult', () => {
    it('should report a valid file when only warnings remain', () => {
      const spies = spyConsole();

      formatter.displayResult('carteira.port', [NO_PROFILE]);

      expect(spies.log.mock.calls[0][0]).toBe('✅ VALID: carteira.port');
      expect(spies.error).not.toHaveBeenCalled();
    });

    it('should report an invalid file on stderr', () => {
      const spies = spyConsole();

      formatter.displayResult('carteira.port', [MISSING_SEMICOLON]);

      expect(spies.error.mock.calls[0][0]).toBe('🚫 INVALID: carteira.port');
      expect(spies.error).toHaveBeenCalledTimes(2);
    });
  });

  describe('displayTokens', () => {
    it('should print one token per line', () => {
      const spies = spyConsole();

      formatter.displayTokens([
        { kind: TokenKind.NOME, value: 'nome', line: 1, column: 1 },
        { kind: TokenKind.NUMBER, value: 3.5, line: 12, column: 40 },
        { kind: TokenKind.EOF, value: null, line: 12, column: 44 }
      ]);

      expect(spies.log.mock.calls[0][0]).toBe([
        `1:1     ${TokenKind.NOME} "nome"`,
        `12:40   ${TokenKind.NUMBER} 3.5`,
        `12:44   ${TokenKind.EOF}`
      ].join('\n'));
    });
  });

  describe('status messages', () => {
    it('should prefix each message with its marker', () => {
      const spies = spyConsole();

      formatter.displayWarning('careful');
      formatter.displayInfo('note');
      formatter.displaySuccess('done');

      expect(spies.error).not.toHaveBeenCalled();
      expect(spies.warn.mock.calls[0][0]).toBe('⚠️  Warning: careful');
      expect(spies.log.mock.calls.map(call => call[0])).toEqual(['ℹ️  note', '✅ done']);
    });
  });
});
