/**
 * Parser - Recursive-descent parser for portfolio documents
 *
 * Every rule is optimistic: a failed expectation records a diagnostic and leaves
 * the offending token in place. Section loops then re-examine that token against
 * the keywords they handle, which is the only recovery mechanism.
 */

import {
  Token,
  TokenKind,
  PortfolioDocument,
  Configuration,
  Horizon,
  HorizonUnit,
  AssetClass,
  Allocation,
  Restrictions,
  RebalancePolicy,
  RebalanceFrequency,
  DiagnosticCategory,
  DiagnosticSeverity
} from './types';
import { DiagnosticCollector } from './diagnostic-collector';
import { KEYWORDS } from './lexer';

const ASSET_CLASSES: ReadonlyMap<TokenKind, AssetClass> = new Map([
  [TokenKind.ACOES_NACIONAIS, AssetClass.DOMESTIC_EQUITIES],
  [TokenKind.ACOES_INTERNACIONAIS, AssetClass.INTERNATIONAL_EQUITIES],
  [TokenKind.FUNDOS_IMOBILIARIOS, AssetClass.REAL_ESTATE_FUNDS],
  [TokenKind.FUNDOS_MULTIMERCADO, AssetClass.MULTI_MARKET_FUNDS],
  [TokenKind.RENDA_FIXA, AssetClass.FIXED_INCOME]
]);

const HORIZON_UNITS: ReadonlyMap<TokenKind, HorizonUnit> = new Map([
  [TokenKind.ANOS, HorizonUnit.YEARS],
  [TokenKind.MESES, HorizonUnit.MONTHS]
]);

const FREQUENCIES: ReadonlyMap<TokenKind, RebalanceFrequency> = new Map([
  [TokenKind.MENSAL, RebalanceFrequency.MONTHLY],
  [TokenKind.TRIMESTRAL, RebalanceFrequency.QUARTERLY],
  [TokenKind.SEMESTRAL, RebalanceFrequency.SEMIANNUAL],
  [TokenKind.ANUAL, RebalanceFrequency.ANNUAL]
]);

const CONFIG_KEYWORDS = [TokenKind.NOME, TokenKind.PERFIL, TokenKind.HORIZONTE_TEMPORAL];
const RESTRICTION_KEYWORDS = [TokenKind.VOLATILIDADE_MAXIMA, TokenKind.TAXA_ADMINISTRATIVA_MAXIMA];

/** Surface spelling of each kind, used in diagnostics */
const TOKEN_LABELS: Partial<Record<TokenKind, string>> = {
  [TokenKind.EQUALS]: "'='",
  [TokenKind.LEFT_BRACE]: "'{'",
  [TokenKind.RIGHT_BRACE]: "'}'",
  [TokenKind.SEMICOLON]: "';'",
  [TokenKind.PERCENT]: "'%'",
  [TokenKind.STRING]: 'string',
  [TokenKind.NUMBER]: 'number',
  [TokenKind.IDENTIFIER]: 'identifier',
  [TokenKind.EOF]: 'end of input'
};

for (const [word, kind] of KEYWORDS) {
  TOKEN_LABELS[kind] = `'${word}'`;
}

function rejectMutation(): never {
  throw new TypeError('Portfolio allocation is read-only');
}

/**
 * Freeze an allocation map. Object.freeze alone leaves a Map's entries writable,
 * so the mutators are shadowed as well.
 */
function freezeAllocation(allocation: Map<AssetClass, number>): Allocation {
  Object.defineProperties(allocation, {
    set: { value: rejectMutation },
    delete: { value: rejectMutation },
    clear: { value: rejectMutation }
  });
  return Object.freeze(allocation);
}

export function describeKind(kind: TokenKind): string {
  return TOKEN_LABELS[kind] ?? kind;
}

/**
 * Raised for parser states that no input should be able to reach
 */
export class ParserFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParserFault';
  }
}

export class PortfolioParser {
  private tokens: Token[] = [];
  private pos = 0;

  constructor(private readonly diagnostics: DiagnosticCollector) {}

  /**
   * Parse a token sequence. Returns null when a structurally required element
   * (carteira, its opening brace, the allocation keyword or its opening brace)
   * is missing, or when the parser hits an internal fault.
   */
  parse(tokens: Token[]): PortfolioDocument | null {
    this.tokens = tokens;
    this.pos = 0;

    try {
      return this.parsePortfolio();
    } catch (error) {
      const location = this.tokens.length > 0
        ? { line: this.current().line, column: this.current().column }
        : undefined;
      this.diagnostics.add({
        category: DiagnosticCategory.SYNTACTIC,
        severity: DiagnosticSeverity.ERROR,
        code: 'SYN999',
        message: `Internal parser error: ${error instanceof Error ? error.message : String(error)}`,
        location
      });
      return null;
    }
  }

  // ==========================================================================
  // Cursor
  // ==========================================================================

  private current(): Token {
    return this.peek(0);
  }

  /**
   * Look ahead without consuming. Offsets past the end clamp to the final token.
   */
  private peek(offset: number): Token {
    if (this.tokens.length === 0) {
      throw new ParserFault('token sequence is empty');
    }
    const index = Math.min(this.pos + offset, this.tokens.length - 1);
    return this.tokens[index];
  }

  private advance(): void {
    if (this.pos < this.tokens.length - 1) {
      this.pos++;
    }
  }

  private at(...kinds: TokenKind[]): boolean {
    return kinds.includes(this.current().kind);
  }

  /**
   * Consume the current token if it has the expected kind. Otherwise report
   * the mismatch and leave the token in place.
   */
  private expect(kind: TokenKind): Token | undefined {
    const token = this.current();
    if (token.kind !== kind) {
      this.reportMismatch(describeKind(kind), token);
      return undefined;
    }
    this.advance();
    return token;
  }

  /**
   * Like expect, for a closed set of alternatives
   */
  private expectOneOf(kinds: readonly TokenKind[]): Token | undefined {
    const token = this.current();
    if (!kinds.includes(token.kind)) {
      this.reportMismatch(kinds.map(describeKind).join(' or '), token);
      return undefined;
    }
    this.advance();
    return token;
  }

  private expectString(): string | undefined {
    const token = this.expect(TokenKind.STRING);
    return token !== undefined && typeof token.value === 'string' ? token.value : undefined;
  }

  private expectNumber(): number | undefined {
    const token = this.expect(TokenKind.NUMBER);
    return token !== undefined && typeof token.value === 'number' ? token.value : undefined;
  }

  /**
   * `= <number> %` as used by allocation, restriction and tolerance fields
   */
  private parsePercentValue(): number | undefined {
    if (!this.expect(TokenKind.EQUALS)) {
      return undefined;
    }
    const value = this.expectNumber();
    const percent = value !== undefined ? this.expect(TokenKind.PERCENT) : undefined;
    this.expect(TokenKind.SEMICOLON);
    return percent !== undefined ? value : undefined;
  }

  // ==========================================================================
  // Grammar rules
  // ==========================================================================

  private parsePortfolio(): PortfolioDocument | null {
    if (!this.expect(TokenKind.CARTEIRA)) {
      return null;
    }
    if (!this.expect(TokenKind.LEFT_BRACE)) {
      return null;
    }

    const configuration = this.parseConfiguration();
    const allocation = this.parseAllocation();
    if (allocation === null) {
      return null;
    }

    let restrictions: Restrictions = {};
    let rebalance: RebalancePolicy = {};

    if (this.at(TokenKind.RESTRICOES)) {
      restrictions = this.parseRestrictions();
    }
    if (this.at(TokenKind.REBALANCEAMENTO)) {
      rebalance = this.parseRebalance();
    }

    this.expect(TokenKind.RIGHT_BRACE);

    return Object.freeze({
      configuration: Object.freeze(configuration),
      allocation: freezeAllocation(allocation),
      restrictions: Object.freeze(restrictions),
      rebalance: Object.freeze(rebalance)
    });
  }

  private parseConfiguration(): Configuration {
    let name: string | undefined;
    let riskProfile: string | undefined;
    let horizon: Horizon | undefined;

    while (this.at(...CONFIG_KEYWORDS)) {
      const keyword = this.current().kind;
      this.advance();

      if (!this.expect(TokenKind.EQUALS)) {
        continue;
      }

      // An empty string leaves the field unset
      if (keyword === TokenKind.NOME) {
        name = this.expectString() || name;
      } else if (keyword === TokenKind.PERFIL) {
        riskProfile = this.expectString() || riskProfile;
      } else {
        horizon = this.parseHorizonValue() ?? horizon;
      }
      this.expect(TokenKind.SEMICOLON);
    }

    return {
      ...(name !== undefined ? { name } : {}),
      ...(riskProfile !== undefined ? { riskProfile } : {}),
      ...(horizon !== undefined ? { horizon } : {})
    };
  }

  /**
   * `<number> anos|meses`; the pair is recognised by two-token lookahead
   */
  private parseHorizonValue(): Horizon | undefined {
    const amountToken = this.peek(0);
    const unitToken = this.peek(1);
    const unit = HORIZON_UNITS.get(unitToken.kind);

    if (amountToken.kind !== TokenKind.NUMBER || unit === undefined) {
      // Not a well-formed pair: report whichever half is missing
      if (this.expectNumber() !== undefined) {
        this.expectOneOf([...HORIZON_UNITS.keys()]);
      }
      return undefined;
    }

    this.advance();
    this.advance();

    const amount = typeof amountToken.value === 'number' ? amountToken.value : NaN;
    if (!Number.isInteger(amount)) {
      this.diagnostics.add({
        category: DiagnosticCategory.SYNTACTIC,
        severity: DiagnosticSeverity.ERROR,
        code: 'SYN002',
        message: `Time horizon must be a whole number, found ${String(amountToken.value)}`,
        location: { line: amountToken.line, column: amountToken.column },
        suggestion: `Use a whole number of ${unit}`
      });
      return undefined;
    }

    return Object.freeze({ amount, unit });
  }

  private parseAllocation(): Map<AssetClass, number> | null {
    if (!this.expect(TokenKind.ALOCACAO)) {
      return null;
    }
    if (!this.expect(TokenKind.LEFT_BRACE)) {
      return null;
    }

    const allocation = new Map<AssetClass, number>();

    let asset = ASSET_CLASSES.get(this.current().kind);
    while (asset !== undefined) {
      this.advance();
      const percentage = this.parsePercentValue();
      if (percentage !== undefined) {
        allocation.set(asset, percentage);
      }
      asset = ASSET_CLASSES.get(this.current().kind);
    }

    this.expect(TokenKind.RIGHT_BRACE);
    return allocation;
  }

  private parseRestrictions(): Restrictions {
    this.advance(); // restrições
    if (!this.expect(TokenKind.LEFT_BRACE)) {
      return {};
    }

    let maxVolatility: number | undefined;
    let maxManagementFee: number | undefined;

    while (this.at(...RESTRICTION_KEYWORDS)) {
      const keyword = this.current().kind;
      this.advance();
      const value = this.parsePercentValue();

      if (keyword === TokenKind.VOLATILIDADE_MAXIMA) {
        maxVolatility = value ?? maxVolatility;
      } else {
        maxManagementFee = value ?? maxManagementFee;
      }
    }

    this.expect(TokenKind.RIGHT_BRACE);

    return {
      ...(maxVolatility !== undefined ? { maxVolatility } : {}),
      ...(maxManagementFee !== undefined ? { maxManagementFee } : {})
    };
  }

  private parseRebalance(): RebalancePolicy {
    this.advance(); // rebalanceamento
    if (!this.expect(TokenKind.LEFT_BRACE)) {
      return {};
    }

    let frequency: RebalanceFrequency | undefined;
    let tolerance: number | undefined;

    if (this.at(TokenKind.FREQUENCIA)) {
      this.advance();
      if (this.expect(TokenKind.EQUALS)) {
        const token = this.expectOneOf([...FREQUENCIES.keys()]);
        frequency = token !== undefined ? FREQUENCIES.get(token.kind) : undefined;
        this.expect(TokenKind.SEMICOLON);
      }
    }

    if (this.at(TokenKind.TOLERANCIA)) {
      this.advance();
      tolerance = this.parsePercentValue();
    }

    this.expect(TokenKind.RIGHT_BRACE);

    return {
      ...(frequency !== undefined ? { frequency } : {}),
      ...(tolerance !== undefined ? { tolerance } : {})
    };
  }

  private reportMismatch(expected: string, found: Token): void {
    this.diagnostics.add({
      category: DiagnosticCategory.SYNTACTIC,
      severity: DiagnosticSeverity.ERROR,
      code: 'SYN001',
      message: `Expected ${expected}, found ${describeKind(found.kind)}`,
      location: { line: found.line, column: found.column },
      suggestion: `Insert ${expected} before ${describeKind(found.kind)}`
    });
  }
}
