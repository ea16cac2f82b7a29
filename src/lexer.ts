/**
 * Lexer - Converts portfolio source text into tokens
 */

import { Token, TokenKind, TokenValue, DiagnosticCategory, DiagnosticSeverity } from './types';
import { DiagnosticCollector } from './diagnostic-collector';

/** Reserved words, matched case-sensitively */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
  ['carteira', TokenKind.CARTEIRA],
  ['nome', TokenKind.NOME],
  ['perfil', TokenKind.PERFIL],
  ['horizonte_temporal', TokenKind.HORIZONTE_TEMPORAL],
  ['alocação', TokenKind.ALOCACAO],
  ['restrições', TokenKind.RESTRICOES],
  ['rebalanceamento', TokenKind.REBALANCEAMENTO],
  ['ações_nacionais', TokenKind.ACOES_NACIONAIS],
  ['ações_internacionais', TokenKind.ACOES_INTERNACIONAIS],
  ['fundos_imobiliarios', TokenKind.FUNDOS_IMOBILIARIOS],
  ['fundos_multimercado', TokenKind.FUNDOS_MULTIMERCADO],
  ['renda_fixa', TokenKind.RENDA_FIXA],
  ['volatilidade_maxima', TokenKind.VOLATILIDADE_MAXIMA],
  ['taxa_administrativa_maxima', TokenKind.TAXA_ADMINISTRATIVA_MAXIMA],
  ['frequencia', TokenKind.FREQUENCIA],
  ['tolerancia', TokenKind.TOLERANCIA],
  ['anos', TokenKind.ANOS],
  ['meses', TokenKind.MESES],
  ['mensal', TokenKind.MENSAL],
  ['trimestral', TokenKind.TRIMESTRAL],
  ['semestral', TokenKind.SEMESTRAL],
  ['anual', TokenKind.ANUAL]
]);

const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map([
  ['=', TokenKind.EQUALS],
  ['{', TokenKind.LEFT_BRACE],
  ['}', TokenKind.RIGHT_BRACE],
  [';', TokenKind.SEMICOLON],
  ['%', TokenKind.PERCENT]
]);

const ACCENTED_LETTERS = 'áàâãéêíóôõúüçÁÀÂÃÉÊÍÓÔÕÚÜÇ';

export class PortfolioLexer {
  private text = '';
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly diagnostics: DiagnosticCollector) {}

  /**
   * Tokenize the whole input. Never throws and always ends with an EOF token,
   * whatever lexical diagnostics were raised on the way.
   */
  tokenize(text: string): Token[] {
    this.text = text;
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    const tokens: Token[] = [];
    let char = this.currentChar();

    while (char !== null) {
      const punctuation = PUNCTUATION.get(char);

      if (char === ' ' || char === '\t' || char === '\r' || char === '\n') {
        this.advance();
      } else if (punctuation !== undefined) {
        tokens.push(this.makeToken(punctuation, char, this.line, this.column));
        this.advance();
      } else if (char === '"') {
        tokens.push(this.readString());
      } else if (isDigit(char)) {
        tokens.push(this.readNumber());
      } else if (isIdentifierStart(char)) {
        tokens.push(this.readIdentifier());
      } else {
        this.report('LEX005', `Unrecognized character: '${char}'`, this.line, this.column,
          'Remove the character or replace it with a supported symbol');
        this.advance();
      }
      char = this.currentChar();
    }

    tokens.push(this.makeToken(TokenKind.EOF, null, this.line, this.column));
    return tokens;
  }

  /**
   * The character at the cursor, read by code point so a surrogate pair
   * counts as one character
   */
  private currentChar(): string | null {
    const codePoint = this.text.codePointAt(this.pos);
    return codePoint !== undefined ? String.fromCodePoint(codePoint) : null;
  }

  private advance(): void {
    const char = this.currentChar();
    if (char === null) {
      return;
    }
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.pos += char.length;
  }

  private readString(): Token {
    const startLine = this.line;
    const startColumn = this.column;
    let value = '';
    this.advance(); // opening quote

    let char = this.currentChar();
    while (char !== null && char !== '"') {
      if (char === '\n' || char === '\r') {
        this.report('LEX001', 'String cannot contain a line break', startLine, startColumn,
          'Close the string on the same line');
        break;
      }
      value += char;
      this.advance();
      char = this.currentChar();
    }

    if (this.currentChar() === '"') {
      this.advance();
    } else {
      this.report('LEX002', 'Unterminated string', startLine, startColumn,
        'Add a closing " at the end of the string');
    }

    return this.makeToken(TokenKind.STRING, value, startLine, startColumn);
  }

  private readNumber(): Token {
    const startLine = this.line;
    const startColumn = this.column;
    let text = '';
    let dots = 0;

    let char = this.currentChar();
    while (char !== null && (isDigit(char) || char === '.')) {
      if (char === '.') {
        dots++;
        if (dots > 1) {
          this.report('LEX003', 'Number has more than one decimal point', startLine, startColumn,
            'Use a single decimal point');
          break;
        }
      }
      text += char;
      this.advance();
      char = this.currentChar();
    }

    const value = dots === 0 ? Number.parseInt(text, 10) : Number.parseFloat(text);
    if (!Number.isFinite(value)) {
      this.report('LEX004', `Invalid number: ${text}`, startLine, startColumn);
      return this.makeToken(TokenKind.NUMBER, 0, startLine, startColumn);
    }

    return this.makeToken(TokenKind.NUMBER, value, startLine, startColumn);
  }

  private readIdentifier(): Token {
    const startLine = this.line;
    const startColumn = this.column;
    let text = '';

    let char = this.currentChar();
    while (char !== null && (isIdentifierStart(char) || isDigit(char))) {
      text += char;
      this.advance();
      char = this.currentChar();
    }

    const kind = KEYWORDS.get(text) ?? TokenKind.IDENTIFIER;
    return this.makeToken(kind, text, startLine, startColumn);
  }

  private makeToken(kind: TokenKind, value: TokenValue, line: number, column: number): Token {
    return Object.freeze({ kind, value, line, column });
  }

  private report(code: string, message: string, line: number, column: number, suggestion?: string): void {
    this.diagnostics.add({
      category: DiagnosticCategory.LEXICAL,
      severity: DiagnosticSeverity.ERROR,
      code,
      message,
      location: { line, column },
      suggestion
    });
  }
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isIdentifierStart(char: string): boolean {
  return (char >= 'a' && char <= 'z') ||
    (char >= 'A' && char <= 'Z') ||
    char === '_' ||
    ACCENTED_LETTERS.includes(char);
}
