/**
 * numeval – Public entry point
 *
 * This file defines the public API surface of numeval:
 *  - Parsing (`parse`, `ExpressionParser`, `createParser`) with an owned
 *    parse cache.
 *  - Binding and evaluation (`Expression`, `evaluate`).
 *  - The AST, symbol and error model.
 *  - Built-in symbol tables as plugins, and plugin composition helpers.
 *  - Inspection and validation utilities.
 *  - Integrations: a headless frame layout model and an HTTP handler.
 *
 * Typical usage:
 *
 *   import { Expression, evaluate, sym } from 'numeval';
 *
 *   evaluate('pow(2, 3) + 1');                          // 9
 *   evaluate('1 > 0 ? 10 : 20', { boolSymbols: true }); // 10
 *
 *   let clock = 0;
 *   const expr = new Expression('t * 2', {
 *     symbols: [[sym.variable('t'), () => clock]],
 *   });
 *   clock = 21;
 *   expr.evaluate(); // 42
 *
 * License: Apache-2.0
 */

/////////////////////////////
// Core                    //
/////////////////////////////

export {
  Expression,
  ExpressionParser,
  clearCache,
  createParser,
  defaultParser,
  evaluate,
  isCached,
  normalizeExpressionOptions,
  normalizeParserOptions,
  parse,
  parseSubExpression,
} from './core/engine';

export { ParsedExpression, DEFAULT_MAX_DEPTH } from './core/parser';
export { ExpressionCache } from './core/cache';
export { Cursor } from './core/cursor';
export { escapeIdentifier } from './core/characters';
export { operatorPrecedence } from './core/operators';
export { optimize } from './core/optimizer';
export { evaluateNode } from './core/evaluator';
export { advancedResolvers, createResolvers } from './core/resolution';
export { SymbolTable, createSymbolTable } from './core/symbol-table';

export {
  ANY_ARITY,
  arityMatches,
  atLeast,
  describeArity,
  describeSymbol,
  exactly,
  isOperatorSymbol,
  sym,
  symbolsEqual,
} from './core/symbols';

export {
  collectSymbols,
  describeNode,
  errorNode,
  firstError,
  isErrorNode,
  isLiteral,
  isSymbolNode,
  literalNode,
  measureDepth,
  symbolNode,
  traverse,
} from './core/ast';

export {
  ExpressionError,
  arityMismatchError,
  arrayBoundsError,
  emptyExpressionError,
  errorsEqual,
  isExpressionError,
  limitError,
  messageError,
  missingDelimiterError,
  undefinedSymbolError,
  unexpectedTokenError,
} from './core/errors';

export type * from './core/types';

/////////////////////////////
// Plugins                 //
/////////////////////////////

export {
  BOOLEAN_SYMBOLS,
  MATH_SYMBOLS,
  applyPlugins,
  booleanPlugin,
  createPluginSet,
  mathPlugin,
} from './plugins';
export type {
  AngleUnit,
  MathPluginOptions,
  Plugin,
  PluginSet,
} from './plugins';

/////////////////////////////
// Utilities               //
/////////////////////////////

export {
  analyzeAst,
  formatExpressionError,
  inspectExpression,
} from './utils/inspect';
export type {
  ExpressionAstInsight,
  FormattedExpressionError,
  InspectExpressionOptions,
} from './utils/inspect';

export {
  isValidIdentifier,
  isValidOperator,
  validateSourceExpression,
  validateSymbolTable,
} from './utils/validation';
export type {
  IssueSeverity,
  SourceExpressionStats,
  SourceExpressionValidationResult,
  ValidateSourceExpressionOptions,
  ValidationIssue,
  ValidationResult,
} from './utils/validation';

/////////////////////////////
// Integrations            //
/////////////////////////////

export { LayoutNode } from './integrations/layout/frameLayout';
export type {
  Frame,
  LayoutNodeOptions,
  LayoutProperty,
  MeasureFn,
  Size,
} from './integrations/layout/frameLayout';

export { createEvalMiddleware } from './integrations/node/evalMiddleware';
export type {
  EvalErrorBody,
  EvalMiddlewareOptions,
  EvalRequest,
  EvalRequestPayload,
  EvalResponse,
  EvalResponseTarget,
  NextFunction,
} from './integrations/node/evalMiddleware';
