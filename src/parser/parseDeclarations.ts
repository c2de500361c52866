import { readFileSync } from 'node:fs';

import { logDebug } from '../dx/logger.js';
import { traceDebug } from '../dx/trace.js';
import { parseMethodOptions } from '../signature/methodOptions.js';
import {
  ConfigurationError,
  type FunctionParam,
  type FunctionSignature,
} from '../signature/signatureTypes.js';
import { sharedParser } from './loadParser.js';
import { readMethodAttribute } from './parseAttribute.js';
import type { SyntaxNode } from './parserTypes.js';
import { firstError, typeFromNode } from './typeFromNode.js';

const FUNCTION_NODES = new Set(['function_item', 'function_signature_item']);
const SCOPE_PARAMS = new Set(['scope', '_scope']);
const STATE_PARAMS = new Set(['state', '_state']);

function line(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

/** Attribute items directly above `node`, nearest first; comments are skipped. */
function attributesOf(node: SyntaxNode): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  let prev = node.previousNamedSibling;
  while (prev && (prev.type === 'attribute_item' || prev.type.endsWith('_comment'))) {
    if (prev.type === 'attribute_item') out.push(prev);
    prev = prev.previousNamedSibling;
  }
  return out;
}

function patternName(param: SyntaxNode): string {
  const pattern = param.childForFieldName('pattern');
  return (pattern?.text ?? '_').replace(/^mut\s+/, '');
}

function readSignature(
  fn: SyntaxNode,
  rawOptions: Record<string, unknown>,
): FunctionSignature {
  const name = fn.childForFieldName('name')?.text;
  if (!name) {
    throw new ConfigurationError(`Line ${line(fn)}: #[method] function without a name`);
  }
  const options = parseMethodOptions(rawOptions, name);

  let usesScope = false;
  let usesState = false;
  const params: FunctionParam[] = [];
  const paramsNode = fn.childForFieldName('parameters');

  for (const p of paramsNode?.namedChildren ?? []) {
    if (p.type !== 'parameter') continue;
    const pname = patternName(p);
    if (SCOPE_PARAMS.has(pname)) {
      usesScope = true;
      continue;
    }
    if (STATE_PARAMS.has(pname)) {
      usesState = true;
      continue;
    }
    const typeNode = p.childForFieldName('type');
    if (!typeNode) {
      throw new ConfigurationError(`Line ${line(p)}: parameter \`${pname}\` of ${name} has no type`);
    }
    params.push({ name: pname, type: typeFromNode(typeNode) });
  }

  const returnNode = fn.childForFieldName('return_type');
  const signature: FunctionSignature = {
    name,
    params,
    returns: returnNode ? typeFromNode(returnNode) : { kind: 'unit' },
    flags: {
      usesScope,
      usesState,
      asyncWrapped: options.promise ?? false,
      fastRequested: options.fast ?? false,
    },
    sourceLine: line(fn),
  };
  if (options.name) signature.jsName = options.name;
  if (options.state) signature.stateType = options.state;
  return signature;
}

function collect(node: SyntaxNode, out: FunctionSignature[]) {
  if (FUNCTION_NODES.has(node.type)) {
    const name = node.childForFieldName('name')?.text;
    for (const attr of attributesOf(node)) {
      const raw = readMethodAttribute(attr.text, name);
      if (raw) {
        out.push(readSignature(node, raw));
        break;
      }
    }
    return;
  }
  for (const child of node.namedChildren) collect(child, out);
}

/**
 * Reads every `#[method]`-annotated `fn` (with a body or signature-only)
 * from Rust-style declaration source, in source order.
 */
export function parseDeclarations(source: string): FunctionSignature[] {
  const tree = sharedParser().parse(source);
  const error = firstError(tree.rootNode);
  if (error) {
    const what = error.isMissing ? `missing ${error.type}` : error.text.slice(0, 40);
    throw new ConfigurationError(`Syntax error at line ${line(error)}: ${what}`);
  }

  const out: FunctionSignature[] = [];
  collect(tree.rootNode, out);
  traceDebug('parse.declarations', { count: out.length, names: out.map((s) => s.name) });
  return out;
}

export function parseDeclarationFile(filePath: string): FunctionSignature[] {
  const source = readFileSync(filePath, 'utf8');
  logDebug('parsing declarations', { filePath });
  return parseDeclarations(source);
}
