import { ConfigurationError, type TypeDesc } from '../signature/signatureTypes.js';
import { sharedParser } from './loadParser.js';
import type { SyntaxNode } from './parserTypes.js';

function pathFromText(text: string, args: TypeDesc[] = []): TypeDesc {
  return { kind: 'path', segments: text.split('::').map((s) => s.trim()), args };
}

/** Lifetimes (`Local<'s, Function>`) carry no type information here. */
function typeArguments(node: SyntaxNode | null): TypeDesc[] {
  if (!node) return [];
  return node.namedChildren.filter((c) => c.type !== 'lifetime').map(typeFromNode);
}

/** Converts a tree-sitter-rust type node into a TypeDesc. */
export function typeFromNode(node: SyntaxNode): TypeDesc {
  switch (node.type) {
    case 'primitive_type':
    case 'type_identifier':
    case 'scoped_type_identifier':
      return pathFromText(node.text);
    case 'generic_type': {
      const head = node.childForFieldName('type');
      return pathFromText(
        head ? head.text : node.text,
        typeArguments(node.childForFieldName('type_arguments')),
      );
    }
    case 'reference_type': {
      const inner = node.childForFieldName('type');
      if (!inner) return { kind: 'other', text: node.text };
      return {
        kind: 'reference',
        mutable: node.namedChildren.some((c) => c.type === 'mutable_specifier'),
        inner: typeFromNode(inner),
      };
    }
    case 'unit_type':
      return { kind: 'unit' };
    default:
      return { kind: 'other', text: node.text };
  }
}

export function firstError(node: SyntaxNode): SyntaxNode | undefined {
  if (node.type === 'ERROR' || node.isMissing) return node;
  for (const child of node.children) {
    const found = firstError(child);
    if (found) return found;
  }
  return undefined;
}

/** Parses one type expression, e.g. `Rc<Counter>` or `Option<String>`. */
export function parseTypeText(text: string): TypeDesc {
  const tree = sharedParser().parse(`type __T = ${text};`);
  const item = tree.rootNode.namedChildren[0];
  const typeNode = item?.type === 'type_item' ? item.childForFieldName('type') : null;
  if (!typeNode || firstError(tree.rootNode) || typeNode.text !== text.trim()) {
    throw new ConfigurationError(`Invalid type \`${text}\``);
  }
  return typeFromNode(typeNode);
}
