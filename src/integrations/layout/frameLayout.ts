/**
 * numeval – Frame layout integration
 *
 * A headless layout tree whose frames are written as expressions:
 *
 *   const root = new LayoutNode({ width: '320', height: '480' });
 *   const header = root.addChild(new LayoutNode({ key: 'header', height: '44' }));
 *   root.addChild(
 *     new LayoutNode({ top: 'header.bottom + 8', height: '100% - top' }),
 *   );
 *   root.updateLayout();
 *
 * Inside a layout expression:
 *  - `n%` is `n` percent of the parent's width (for `left`, `width`) or
 *    height (for `top`, `height`); 0 without a parent.
 *  - `auto` (only in `width` / `height`) asks the node's `measure` callback.
 *  - `left`, `top`, `width`, `height`, `right`, `bottom` are the node's own
 *    computed values.
 *  - `key.prop` reads a property of the node with that key, anywhere in the
 *    tree.
 *
 * These symbols read the tree at evaluation time, so they are bound as
 * impure and never folded; plain arithmetic still is.
 *
 * License: Apache-2.0
 */

import type { SymbolEvaluator } from '../../core/ast';
import { defaultParser, Expression, type ExpressionParser } from '../../core/engine';
import { messageError, undefinedSymbolError } from '../../core/errors';
import { sym, type ExpressionSymbol } from '../../core/symbols';

/////////////////////////////
// Types                   //
/////////////////////////////

export type LayoutProperty = 'left' | 'top' | 'width' | 'height';

export interface Size {
  width: number;
  height: number;
}

export interface Frame extends Size {
  left: number;
  top: number;
}

/**
 * Intrinsic size of a node's content, given the space available to it.
 */
export type MeasureFn = (available: Size) => Size;

export interface LayoutNodeOptions {
  key?: string;
  left?: string;
  top?: string;
  width?: string;
  height?: string;
  measure?: MeasureFn;
  /** Parser for the property expressions. Default: `defaultParser`. */
  parser?: ExpressionParser;
}

const DEFAULTS: Readonly<Record<LayoutProperty, string>> = {
  left: '0',
  top: '0',
  width: '100%',
  height: '100%',
};

const HORIZONTAL: ReadonlySet<LayoutProperty> = new Set(['left', 'width']);

/////////////////////////////
// LayoutNode              //
/////////////////////////////

export class LayoutNode {
  key?: string;
  measure?: MeasureFn;

  /** Last frame computed by `updateLayout()`. */
  frame: Frame = { left: 0, top: 0, width: 0, height: 0 };

  private parentNode: LayoutNode | null = null;
  private readonly childNodes: LayoutNode[] = [];
  private readonly parser: ExpressionParser;
  private readonly sources = new Map<LayoutProperty, string>();
  private readonly props = new Map<LayoutProperty, Expression>();
  private readonly inProgress = new Set<string>();

  constructor(options: LayoutNodeOptions = {}) {
    this.key = options.key;
    this.measure = options.measure;
    this.parser = options.parser ?? defaultParser;
    this.left = options.left;
    this.top = options.top;
    this.width = options.width;
    this.height = options.height;
  }

  get left(): string | undefined {
    return this.sources.get('left');
  }
  set left(source: string | undefined) {
    this.setProperty('left', source);
  }

  get top(): string | undefined {
    return this.sources.get('top');
  }
  set top(source: string | undefined) {
    this.setProperty('top', source);
  }

  get width(): string | undefined {
    return this.sources.get('width');
  }
  set width(source: string | undefined) {
    this.setProperty('width', source);
  }

  get height(): string | undefined {
    return this.sources.get('height');
  }
  set height(source: string | undefined) {
    this.setProperty('height', source);
  }

  /////////////////////////////
  // Tree                    //
  /////////////////////////////

  get parent(): LayoutNode | null {
    return this.parentNode;
  }

  get children(): readonly LayoutNode[] {
    return this.childNodes;
  }

  /** Appends `child` (detaching it from any previous parent) and returns it. */
  addChild(child: LayoutNode): LayoutNode {
    child.parentNode?.removeChild(child);
    child.parentNode = this;
    this.childNodes.push(child);
    return child;
  }

  removeChild(child: LayoutNode): void {
    const index = this.childNodes.indexOf(child);
    if (index >= 0) {
      this.childNodes.splice(index, 1);
      child.parentNode = null;
    }
  }

  root(): LayoutNode {
    let node: LayoutNode = this;
    while (node.parentNode) {
      node = node.parentNode;
    }
    return node;
  }

  /** Depth-first search of this subtree, including this node. */
  findByKey(key: string): LayoutNode | undefined {
    if (this.key === key) {
      return this;
    }
    for (const child of this.childNodes) {
      const match = child.findByKey(key);
      if (match) {
        return match;
      }
    }
    return undefined;
  }

  /////////////////////////////
  // Layout                  //
  /////////////////////////////

  /**
   * Value of one of `left`, `top`, `width`, `height`, `right`, `bottom`,
   * evaluated against the current tree.
   */
  computedValue(key: string): number {
    if (this.inProgress.has(key)) {
      throw messageError(`Circular reference: ${key} depends on itself`);
    }
    this.inProgress.add(key);
    try {
      const expression = isLayoutProperty(key) ? this.props.get(key) : undefined;
      if (expression) {
        return expression.evaluate();
      }
      switch (key) {
        case 'right':
          return this.computedValue('left') + this.computedValue('width');
        case 'bottom':
          return this.computedValue('top') + this.computedValue('height');
        default:
          throw undefinedSymbolError(sym.variable(key));
      }
    } finally {
      this.inProgress.delete(key);
    }
  }

  /**
   * Compute this node's frame, then its children's, top-down.
   */
  updateLayout(): void {
    this.frame = {
      left: this.computedValue('left'),
      top: this.computedValue('top'),
      width: this.computedValue('width'),
      height: this.computedValue('height'),
    };
    for (const child of this.childNodes) {
      child.updateLayout();
    }
  }

  /////////////////////////////
  // Binding                 //
  /////////////////////////////

  private setProperty(property: LayoutProperty, source: string | undefined): void {
    if (source === undefined) {
      this.sources.delete(property);
    } else {
      this.sources.set(property, source);
    }
    const parsed = this.parser.parse(source ?? DEFAULTS[property]);
    this.props.set(
      property,
      Expression.advanced(parsed, (symbol) => this.resolve(property, symbol)),
    );
  }

  private resolve(property: LayoutProperty, symbol: ExpressionSymbol): SymbolEvaluator | undefined {
    if (symbol.kind === 'postfix' && symbol.name === '%') {
      return ([percent]) => {
        const parent = this.parentNode;
        if (!parent) {
          return 0;
        }
        const base = HORIZONTAL.has(property) ? parent.frame.width : parent.frame.height;
        return (base / 100) * percent;
      };
    }
    if (symbol.kind !== 'variable') {
      return undefined;
    }
    if (symbol.name === 'auto') {
      return this.autoSize(property);
    }

    const parts = symbol.name.split('.');
    if (parts.length === 2) {
      const [key, name] = parts;
      return () => {
        const node = this.root().findByKey(key);
        if (!node) {
          throw messageError(`No node found for key \`${key}\``);
        }
        return node.computedValue(name);
      };
    }
    return () => this.computedValue(symbol.name);
  }

  private autoSize(property: LayoutProperty): SymbolEvaluator {
    switch (property) {
      case 'width':
        return () => this.measureContent(this.availableSize()).width;
      case 'height':
        return () =>
          this.measureContent({
            ...this.availableSize(),
            width: this.computedValue('width'),
          }).height;
      default:
        return () => {
          throw messageError('`auto` can only be used for width or height');
        };
    }
  }

  private availableSize(): Size {
    const parent = this.parentNode;
    return parent
      ? { width: parent.frame.width, height: parent.frame.height }
      : { width: 0, height: 0 };
  }

  private measureContent(available: Size): Size {
    if (!this.measure) {
      throw messageError('`auto` requires a measure function');
    }
    return this.measure(available);
  }
}

function isLayoutProperty(key: string): key is LayoutProperty {
  return key === 'left' || key === 'top' || key === 'width' || key === 'height';
}
