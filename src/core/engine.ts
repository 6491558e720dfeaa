/**
 * numeval – Engine
 *
 * Public entry points tying the parser, the resolvers and the evaluator
 * together:
 *
 *  - `ExpressionParser` / `createParser` – parsing with an owned cache and
 *    parse limits. `defaultParser` backs the top-level `parse`,
 *    `clearCache` and `isCached` helpers.
 *  - `Expression` – a bound, immutable, evaluation-ready expression.
 *  - `evaluate(source, options)` – one-shot helper.
 *
 *   const expr = new Expression('max(a[0], x) * 2', {
 *     constants: { x: 4 },
 *     arrays: { a: [10, 20] },
 *   });
 *   expr.evaluate();   // 20
 *   expr.description;  // "max(a[0], x) * 2"
 *
 * Errors are deferred: construction never throws for bad input, and
 * `evaluate()` raises the first problem it meets.
 *
 * License: Apache-2.0
 */

import {
  collectSymbols,
  describeNode,
  type ExpressionNode,
} from './ast';
import { ExpressionCache } from './cache';
import type { Cursor } from './cursor';
import { evaluateNode } from './evaluator';
import { optimize, type ImpureResolver } from './optimizer';
import {
  DEFAULT_MAX_DEPTH,
  ParsedExpression,
  parseExpression,
  parseSubExpression as parseSubExpressionWithLimits,
  type ParseLimits,
} from './parser';
import {
  advancedResolvers,
  createResolvers,
  type OptionalPureResolver,
} from './resolution';
import { createSymbolTable, type SymbolSource, type SymbolTable } from './symbol-table';
import type { ExpressionSymbol } from './symbols';

//////////////////////
// Parser options   //
//////////////////////

export interface ParserOptions extends ParseLimits {
  /**
   * Cache parsed trees by source text.
   *
   * Default: true.
   */
  cache?: boolean;

  /**
   * Called with the source text every time it is actually tokenized (a
   * cache miss or an uncached parse). Useful for metrics and tests.
   */
  onParse?: (source: string) => void;
}

export interface NormalizedParserOptions {
  readonly maxExpressionLength?: number;
  readonly maxDepth: number;
  readonly cache: boolean;
  readonly onParse?: (source: string) => void;
}

export function normalizeParserOptions(opts: ParserOptions = {}): NormalizedParserOptions {
  return {
    maxExpressionLength:
      typeof opts.maxExpressionLength === 'number' && opts.maxExpressionLength >= 0
        ? opts.maxExpressionLength
        : undefined,
    maxDepth:
      typeof opts.maxDepth === 'number' && opts.maxDepth >= 0
        ? opts.maxDepth
        : DEFAULT_MAX_DEPTH,
    cache: typeof opts.cache === 'boolean' ? opts.cache : true,
    onParse: typeof opts.onParse === 'function' ? opts.onParse : undefined,
  };
}

//////////////////////
// ExpressionParser //
//////////////////////

/**
 * Parser with its own cache. Applications that want isolated caches (one
 * per tenant, per document, per test) create their own; everything else can
 * use `defaultParser`.
 */
export class ExpressionParser {
  public readonly options: NormalizedParserOptions;
  public readonly cache = new ExpressionCache();

  constructor(options?: ParserOptions) {
    this.options = normalizeParserOptions(options);
  }

  /**
   * Parse `source`. Never throws; see `ParsedExpression.error`.
   */
  parse(source: string, useCache: boolean = this.options.cache): ParsedExpression {
    if (useCache) {
      const cached = this.cache.get(source);
      if (cached) {
        return new ParsedExpression(cached);
      }
    }

    this.options.onParse?.(source);
    const parsed = parseExpression(source, this.options);

    if (useCache) {
      this.cache.set(source, parsed.root);
    }
    return parsed;
  }

  /**
   * Like `parse`, but throws the first error found in the tree.
   */
  parseOrThrow(source: string, useCache: boolean = this.options.cache): ParsedExpression {
    const parsed = this.parse(source, useCache);
    const error = parsed.error;
    if (error) {
      throw error;
    }
    return parsed;
  }

  /**
   * Parse an expression embedded in a larger text, up to one of
   * `delimiters`. Advances `cursor`; never cached.
   */
  parseSubExpression(cursor: Cursor, delimiters: readonly string[]): ParsedExpression {
    this.options.onParse?.(cursor.toString());
    return parseSubExpressionWithLimits(cursor, delimiters, this.options);
  }

  /** Drop one cached entry, or all of them. */
  clearCache(source?: string): void {
    if (source === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(source);
    }
  }

  isCached(source: string): boolean {
    return this.cache.has(source);
  }
}

export function createParser(options?: ParserOptions): ExpressionParser {
  return new ExpressionParser(options);
}

/**
 * Shared parser used when no other is supplied.
 */
export const defaultParser: ExpressionParser = createParser();

export function parse(source: string, useCache = true): ParsedExpression {
  return defaultParser.parse(source, useCache);
}

export function parseSubExpression(
  cursor: Cursor,
  delimiters: readonly string[],
): ParsedExpression {
  return defaultParser.parseSubExpression(cursor, delimiters);
}

export function clearCache(source?: string): void {
  defaultParser.clearCache(source);
}

export function isCached(source: string): boolean {
  return defaultParser.isCached(source);
}

//////////////////////////
// Expression options   //
//////////////////////////

/** Values keyed by name, as a plain object or a `Map`. */
export type NameMap<T> = Readonly<Record<string, T>> | ReadonlyMap<string, T>;

export interface ExpressionOptions {
  /** Bind every symbol as impure: no constant folding. Default: false. */
  noOptimize?: boolean;

  /** Enable `true`, `false`, comparisons, `&&`, `||`, `!` and `?:`. Default: false. */
  boolSymbols?: boolean;

  /**
   * Treat every entry of `symbols` as pure, so calls with literal arguments
   * are folded. Default: false.
   */
  pureSymbols?: boolean;

  /** Named constants; always folded. */
  constants?: NameMap<number>;

  /** Named arrays, indexed as `name[i]`; always folded. */
  arrays?: NameMap<readonly number[]>;

  /** Caller-supplied variables, operators, functions and arrays. */
  symbols?: SymbolSource;

  /** Parser used when the source is a string. Default: `defaultParser`. */
  parser?: ExpressionParser;
}

export interface NormalizedExpressionOptions {
  readonly noOptimize: boolean;
  readonly boolSymbols: boolean;
  readonly pureSymbols: boolean;
  readonly constants: ReadonlyMap<string, number>;
  readonly arrays: ReadonlyMap<string, readonly number[]>;
  readonly symbols: SymbolTable;
  readonly parser: ExpressionParser;
}

function isMap<T>(value: NameMap<T>): value is ReadonlyMap<string, T> {
  return value instanceof Map;
}

function toMap<T>(value: NameMap<T> | undefined): ReadonlyMap<string, T> {
  if (value === undefined) {
    return new Map<string, T>();
  }
  return isMap(value) ? value : new Map(Object.entries(value));
}

export function normalizeExpressionOptions(
  opts: ExpressionOptions = {},
): NormalizedExpressionOptions {
  return {
    noOptimize: opts.noOptimize === true,
    boolSymbols: opts.boolSymbols === true,
    pureSymbols: opts.pureSymbols === true,
    constants: toMap(opts.constants),
    arrays: toMap(opts.arrays),
    symbols: createSymbolTable(opts.symbols),
    parser: opts.parser ?? defaultParser,
  };
}

//////////////////////
// Expression       //
//////////////////////

/** A root already bound by `Expression.advanced`; not constructible outside. */
class BoundTree {
  constructor(public readonly root: ExpressionNode) {}
}

/**
 * A parsed and bound expression. Immutable; `evaluate()` may be called any
 * number of times. Bound evaluators supplied by the caller decide whether
 * repeated calls return the same value.
 */
export class Expression {
  /** Bound tree; every symbol node carries an evaluator. */
  public readonly root: ExpressionNode;
  /**
   * The options the tree was bound with. Undefined for `Expression.advanced`,
   * which binds through caller resolvers instead.
   */
  public readonly options: NormalizedExpressionOptions | undefined;

  constructor(source: string | ParsedExpression | BoundTree, options?: ExpressionOptions) {
    if (source instanceof BoundTree) {
      this.root = source.root;
      this.options = undefined;
      return;
    }
    const normalized = normalizeExpressionOptions(options);
    const parsed =
      typeof source === 'string' ? normalized.parser.parse(source) : source;
    const { impure, pure } = createResolvers(normalized);
    this.root = optimize(parsed.root, impure, pure);
    this.options = normalized;
  }

  /**
   * Bind with caller-defined resolvers. `impure` results are never folded;
   * `pure` results are, and the math and boolean tables back `pure` up.
   *
   *   Expression.advanced(parse('width * 50%'), (symbol) =>
   *     symbol.kind === 'variable' ? () => view.width : undefined,
   *   );
   */
  static advanced(
    parsed: ParsedExpression,
    impure: ImpureResolver,
    pure: OptionalPureResolver = () => undefined,
  ): Expression {
    const resolvers = advancedResolvers(impure, pure);
    return new Expression(
      new BoundTree(optimize(parsed.root, resolvers.impure, resolvers.pure)),
    );
  }

  evaluate(): number {
    return evaluateNode(this.root);
  }

  /** Pretty-printed bound tree (after folding). */
  get description(): string {
    return describeNode(this.root);
  }

  /** Symbols remaining after folding. */
  get symbols(): readonly ExpressionSymbol[] {
    return collectSymbols(this.root);
  }

  toString(): string {
    return this.description;
  }
}

/**
 * Parse, bind and evaluate in one call.
 */
export function evaluate(source: string, options?: ExpressionOptions): number {
  return new Expression(source, options).evaluate();
}
