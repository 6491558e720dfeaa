/**
 * numeval – Core / public types
 *
 * Type-only re-exports so consumers can import every public type from one
 * place without knowing the file layout. Nothing here has runtime behavior.
 *
 *   import type {
 *     ExpressionNode,
 *     ExpressionOptions,
 *     ExpressionSymbol,
 *     SymbolEvaluator,
 *   } from 'numeval/core/types';
 *
 * License: Apache-2.0
 */

export type {
  ErrorNode,
  ExpressionNode,
  LiteralNode,
  NodeType,
  OperatorNode,
  SymbolEvaluator,
  SymbolNode,
  Visitor,
  VisitResult,
} from './ast';

export type { CharacterPredicate } from './cursor';

export type {
  ExpressionErrorCode,
  ExpressionErrorDetail,
  ExpressionErrorKind,
  LimitName,
} from './errors';

export type {
  ExpressionOptions,
  NameMap,
  NormalizedExpressionOptions,
  NormalizedParserOptions,
  ParserOptions,
} from './engine';

export type { OperatorPrecedence } from './operators';

export type { ImpureResolver, PureResolver } from './optimizer';

export type { ParseLimits } from './parser';

export type { OptionalPureResolver, ResolutionPolicy, Resolvers } from './resolution';

export type { SymbolEntry, SymbolSource } from './symbol-table';

export type {
  Arity,
  ArraySymbol,
  ExpressionSymbol,
  FunctionSymbol,
  NamedSymbol,
  OperatorKind,
  OperatorSymbol,
  SymbolKind,
  VariableSymbol,
} from './symbols';
