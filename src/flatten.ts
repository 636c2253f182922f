/**
 * Flatten
 *
 * Rewrites a syntax tree into its canonical form without changing which
 * calls it accepts: single-child wrappers disappear, nested sequences are
 * spliced into their parent and a variant that is nothing but a bare group
 * is replaced by that group's variants. Returns a new tree.
 */

import type { SyntaxNode, VariantGroupNode } from './types';

/** Where a node sits. null is the root of the tree. */
interface Placement {
  /** The node is the only entry of the list it belongs to. */
  sole: boolean;
}

export function flatten(node: SyntaxNode): SyntaxNode {
  return flattenNode(node, null);
}

function flattenNode(node: SyntaxNode, placement: Placement | null): SyntaxNode {
  switch (node.type) {
    case 'literal':
    case 'parameter':
    case 'tail':
      return { ...node };

    case 'sequence':
      if (node.children.length === 1) {
        return flattenNode(node.children[0], placement);
      }
      return { type: 'sequence', children: flattenList(node.children, true) };

    case 'optional':
      return {
        type: 'optional',
        // `[(a|b)]:id` keeps its parentheses; `[a|b]:id` would hand the id to the group
        children: flattenList(node.children, node.identifier === null),
        identifier: node.identifier,
      };

    case 'unordered':
      if (node.children.length === 1 && node.identifier === null) {
        return flattenNode(node.children[0], placement);
      }
      // A bare group cannot be written directly inside braces
      return {
        type: 'unordered',
        children: node.children.map(child => flattenNode(child, { sole: false })),
        identifier: node.identifier,
      };

    case 'variant_group':
      return flattenVariantGroup(node, placement);
  }
}

/**
 * Flatten each entry of a list, splicing nested sequences in place.
 * `soleAllowed` is false when a lone entry must still be parenthesized.
 */
function flattenList(children: SyntaxNode[], soleAllowed: boolean): SyntaxNode[] {
  const placement: Placement = { sole: soleAllowed && children.length === 1 };
  const result: SyntaxNode[] = [];

  for (const child of children) {
    const flat = flattenNode(child, placement);
    if (flat.type === 'sequence') {
      result.push(...flat.children);
    } else {
      result.push(flat);
    }
  }

  return result;
}

function flattenVariantGroup(node: VariantGroupNode, placement: Placement | null): SyntaxNode {
  if (node.variants.length === 1 && node.identifier === null) {
    return flattenNode({ type: 'sequence', children: node.variants[0] }, placement);
  }

  const variants: SyntaxNode[][] = [];
  for (const variant of node.variants) {
    const flat = flattenList(variant, true);
    const only = flat.length === 1 ? flat[0] : undefined;
    if (only !== undefined && only.type === 'variant_group' && !only.parentheses && only.identifier === null) {
      variants.push(...only.variants);
    } else {
      variants.push(flat);
    }
  }

  return {
    type: 'variant_group',
    variants,
    identifier: node.identifier,
    inheritedIdentifier: node.inheritedIdentifier,
    parentheses: (placement !== null && !placement.sole) ||
      (node.identifier !== null && !node.inheritedIdentifier),
  };
}
