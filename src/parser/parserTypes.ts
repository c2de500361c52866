import type Parser from 'tree-sitter';

export type SyntaxNode = Parser.SyntaxNode;
