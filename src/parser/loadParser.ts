import Parser from 'tree-sitter';
import Rust from 'tree-sitter-rust';

let shared: Parser | undefined;

export function createParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Rust);
  return parser;
}

/** Parsing is synchronous, so one parser serves the whole process. */
export function sharedParser(): Parser {
  shared ??= createParser();
  return shared;
}
