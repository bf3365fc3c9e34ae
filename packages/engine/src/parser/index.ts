export { getPythonParser } from "./tree-sitter-init";
export {
  SyntaxTree,
  ParentIndex,
  parseSource,
  kindOf,
  walk,
  findAllOfKind,
  namedChildren,
  childrenOfType,
  dottedName,
  keywordArgs,
  positionalArgCount,
} from "./syntax-tree";
export type { NodeKind, ParseError, ParseResult } from "./syntax-tree";
export { functionsOf, describeFunction } from "./functions";
export type { FunctionInfo } from "./functions";
