/**
 * numeval/examples/basic-node/index.ts
 *
 * Minimal Node.js example showing how to:
 *  - Evaluate a one-off expression.
 *  - Bind constants, arrays and custom functions.
 *  - Keep a symbol live (impure) so the same Expression tracks changing state.
 *  - Handle errors.
 *
 * How to run (from repo root):
 *   npm run example
 *   npm run example -- "pow(2, 10) / 4"
 */

import {
  Expression,
  ExpressionError,
  evaluate,
  formatExpressionError,
  inspectExpression,
  sym,
} from '../../src'; // 'numeval' in external projects

// 1. One-off evaluation

function runBasic(): void {
  console.log('=== evaluate() ===');
  console.log('1 + 2 * 3        =', evaluate('1 + 2 * 3'));
  console.log('max(1, 5, 3)     =', evaluate('max(1, 5, 3)'));
  console.log('1 > 0 ? 10 : 20  =', evaluate('1 > 0 ? 10 : 20', { boolSymbols: true }));
  console.log();
}

// 2. Constants, arrays and custom functions

function runPricing(): void {
  console.log('=== Expression with constants, arrays and functions ===');

  const expression = new Expression(
    'round2((subtotal - discount(subtotal) + shipping[zone]) * (1 + taxRate))',
    {
      constants: { subtotal: 150, taxRate: 0.2, zone: 1 },
      arrays: { shipping: [0, 10, 25] },
      symbols: [
        [sym.function('discount', 1), ([subtotal]) => (subtotal >= 100 ? subtotal * 0.1 : 0)],
        [sym.function('round2', 1), ([value]) => Math.round(value * 100) / 100],
      ],
    },
  );

  console.log(inspectExpression(expression));
  console.log('Total:', expression.evaluate());
  console.log();
}

// 3. Live symbols

function runLive(): void {
  console.log('=== Impure symbols are read on every evaluate() ===');

  let elapsed = 0;
  const expression = new Expression('min(elapsed / 10, 1) * 100', {
    symbols: [[sym.variable('elapsed'), () => elapsed]],
  });

  for (elapsed = 0; elapsed <= 12; elapsed += 4) {
    console.log(`elapsed=${elapsed} progress=${expression.evaluate()}%`);
  }
  console.log();
}

// 4. CLI: evaluate an expression passed on the command line

function runWithCliExpression(): void {
  const [, , ...args] = process.argv;
  const cliExpression = args.join(' ');

  if (!cliExpression) {
    console.log('No CLI expression provided, skipping CLI example.\n');
    return;
  }

  console.log('=== CLI expression ===');
  console.log('Expression:', cliExpression);
  try {
    console.log('Result:', evaluate(cliExpression, { boolSymbols: true }));
  } catch (err) {
    handleError(err, cliExpression);
  }
  console.log();
}

// 5. Error handling

function handleError(err: unknown, source: string): void {
  if (err instanceof ExpressionError) {
    const formatted = formatExpressionError(err, source);
    console.error('Expression error:');
    console.error('  code   :', formatted.code);
    console.error('  message:', formatted.message);
  } else {
    console.error('Unexpected error:', err);
  }
}

function main(): void {
  console.log('### numeval basic Node example ###');
  console.log();

  runBasic();
  runPricing();
  runLive();
  runWithCliExpression();

  handleError(captureError(() => evaluate('sqrt(1, 2)')), 'sqrt(1, 2)');
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

main();
