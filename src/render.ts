/**
 * Render
 *
 * Turns a syntax tree back into specification text. For a flattened tree,
 * parsing the result gives the same tree again.
 */

import type { OptionalNode, SyntaxNode } from './types';

export function render(node: SyntaxNode): string {
  return renderNode(node, true);
}

function renderNode(node: SyntaxNode, root: boolean): string {
  switch (node.type) {
    case 'literal':
      return node.value + (node.caseSensitive ? '' : '^') + (node.tolerant ? '~' : '');

    case 'parameter':
      return node.typeName === null ? `<${node.name}>` : `<${node.name}: ${node.typeName}>`;

    case 'tail':
      return `<${node.name}...${node.raw ? '*' : ''}>`;

    case 'sequence': {
      const inner = renderList(node.children);
      return root ? inner : `(${inner})`;
    }

    case 'optional':
      return `[${renderList(node.children)}]${optionalSuffix(node)}`;

    case 'variant_group': {
      const inner = node.variants.map(renderList).join('|');
      const text = node.parentheses ? `(${inner})` : inner;
      return node.identifier !== null && !node.inheritedIdentifier ? `${text}:${node.identifier}` : text;
    }

    case 'unordered':
      return `{${renderList(node.children)}}${node.identifier === null ? '' : `:${node.identifier}`}`;
  }
}

function renderList(children: SyntaxNode[]): string {
  return children.map(child => renderNode(child, false)).join(' ');
}

/** An identifier written after `]`, whether it belongs to the optional or to the group inside it. */
function optionalSuffix(node: OptionalNode): string {
  if (node.identifier !== null) {
    return `:${node.identifier}`;
  }
  const only = node.children.length === 1 ? node.children[0] : undefined;
  if (only !== undefined && only.type === 'variant_group' && only.inheritedIdentifier && only.identifier !== null) {
    return `:${only.identifier}`;
  }
  return '';
}
