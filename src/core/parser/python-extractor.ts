/**
 * Python Extractor
 *
 * Walks a Tree-sitter Python syntax tree and reads the declarations of one
 * file into a ModuleRecord: top-level functions, top-level classes with their
 * methods, fields and bases. Nested definitions are not surfaced.
 *
 * @module
 */

import type { Node, Tree } from "web-tree-sitter";
import type {
  CallableRecord,
  ClassRecord,
  FieldRecord,
  ModuleRecord,
  ParameterRecord,
} from "../models/records.js";

// =============================================================================
// Types
// =============================================================================

type SyntaxNode = Node;

/**
 * First syntax problem found in a tree. Line and column are 1-indexed.
 */
export interface SyntaxDiagnostic {
  message: string;
  line: number;
  column: number;
}

/** A definition together with the decorators written above it */
interface Definition {
  node: SyntaxNode;
  decorators: string[];
}

const PARAMETER_NODE_TYPES = new Set([
  "identifier",
  "typed_parameter",
  "default_parameter",
  "typed_default_parameter",
  "list_splat_pattern",
  "dictionary_splat_pattern",
]);

/** Argument-list entries that are not base classes */
const NON_BASE_NODE_TYPES = new Set(["keyword_argument", "list_splat", "dictionary_splat", "comment"]);

/** Statements tree-sitter still accepts from Python 2 */
const LEGACY_STATEMENTS: Record<string, string> = {
  print_statement: "print statement",
  exec_statement: "exec statement",
};

// =============================================================================
// Tree Helpers
// =============================================================================

function isNode(node: SyntaxNode | null): node is SyntaxNode {
  return node !== null;
}

export function childrenOf(node: SyntaxNode): SyntaxNode[] {
  return node.children.filter(isNode);
}

function namedChildrenOf(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter(isNode);
}

/**
 * 1-based column of a node, counted in UTF-8 bytes from the start of its line.
 */
export function byteColumn(source: string, node: SyntaxNode): number {
  const lineStart = source.lastIndexOf("\n", node.startIndex - 1) + 1;
  return Buffer.byteLength(source.slice(lineStart, node.startIndex), "utf8") + 1;
}

function legacySyntax(node: SyntaxNode): string | null {
  const statement = LEGACY_STATEMENTS[node.type];
  if (statement) return statement;
  // `raise E, "message"`
  if (node.type === "raise_statement" && namedChildrenOf(node).some((c) => c.type === "expression_list")) {
    return "raise statement with arguments";
  }
  return null;
}

/**
 * Returns the first problem in document order: an ERROR node, a missing
 * node, or a Python 2 statement that Python 3 rejects.
 */
export function findSyntaxError(tree: Tree, source: string): SyntaxDiagnostic | null {
  const stack: SyntaxNode[] = [tree.rootNode];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    const legacy = legacySyntax(node);
    if (node.type === "ERROR" || node.isMissing || legacy) {
      const line = node.startPosition.row + 1;
      const column = byteColumn(source, node);
      const where = `at line ${line}, column ${column}`;
      const message = node.isMissing
        ? `Missing "${node.type}" ${where}`
        : legacy
          ? `Python 2 ${legacy} ${where}`
          : `Invalid syntax ${where}`;
      return { message, line, column };
    }

    stack.push(...childrenOf(node).reverse());
  }

  return null;
}

// =============================================================================
// Python Extractor Class
// =============================================================================

/**
 * Reads declarations out of a parsed Python module.
 *
 * @example
 * ```typescript
 * const { tree } = manager.parseCode(source);
 * const record = new PythonExtractor().extract(tree, source, "pkg/client.py");
 * tree.delete();
 * ```
 */
export class PythonExtractor {
  private sourceCode = "";

  /**
   * Extracts the top-level declarations of a syntactically valid tree.
   */
  extract(tree: Tree, sourceCode: string, filePath: string): ModuleRecord {
    this.sourceCode = sourceCode;

    const functions: CallableRecord[] = [];
    const classes: ClassRecord[] = [];

    for (const { node, decorators } of this.definitionsIn(tree.rootNode)) {
      if (node.type === "function_definition") {
        functions.push(this.parseCallable(node, decorators));
      } else if (node.type === "class_definition") {
        const cls = this.parseClass(node);
        if (cls) classes.push(cls);
      }
    }

    return { filePath, functions, classes };
  }

  // ===========================================================================
  // Definitions
  // ===========================================================================

  /**
   * Direct function and class definitions of a module or block, with
   * decorators unwrapped.
   */
  private definitionsIn(container: SyntaxNode): Definition[] {
    const definitions: Definition[] = [];

    for (const child of namedChildrenOf(container)) {
      if (child.type === "function_definition" || child.type === "class_definition") {
        definitions.push({ node: child, decorators: [] });
      } else if (child.type === "decorated_definition") {
        const definition = child.childForFieldName("definition");
        if (!definition) continue;
        const decorators = namedChildrenOf(child)
          .filter((c) => c.type === "decorator")
          .map((c) => c.text);
        definitions.push({ node: definition, decorators });
      }
    }

    return definitions;
  }

  // ===========================================================================
  // Callables
  // ===========================================================================

  private parseCallable(node: SyntaxNode, decorators: string[]): CallableRecord {
    const nameNode = node.childForFieldName("name");
    const paramsNode = node.childForFieldName("parameters");
    const returnNode = node.childForFieldName("return_type");
    const bodyNode = node.childForFieldName("body");

    return {
      identifier: nameNode?.text ?? "",
      parameters: paramsNode ? this.parseParameters(paramsNode) : [],
      decorators,
      returnType: returnNode ? returnNode.text : null,
      body: bodyNode ? this.getSuiteText(node, bodyNode) : "",
    };
  }

  /**
   * Parses a `parameters` node in declaration order. The bare `*` and `/`
   * markers are not parameters.
   */
  private parseParameters(paramsNode: SyntaxNode): ParameterRecord[] {
    const params: ParameterRecord[] = [];

    for (const child of namedChildrenOf(paramsNode)) {
      if (!PARAMETER_NODE_TYPES.has(child.type)) continue;

      const identifier = this.parameterName(child);
      if (!identifier) continue;

      const typeNode = child.childForFieldName("type");
      params.push({
        identifier,
        type: typeNode ? typeNode.text : null,
        line: child.startPosition.row + 1,
        column: byteColumn(this.sourceCode, child),
      });
    }

    return params;
  }

  private parameterName(node: SyntaxNode): string | null {
    switch (node.type) {
      case "identifier":
      case "list_splat_pattern":
      case "dictionary_splat_pattern":
        return node.text;
      case "default_parameter":
      case "typed_default_parameter":
        return node.childForFieldName("name")?.text ?? null;
      case "typed_parameter": {
        // the name is the one unlabelled named child: identifier or splat pattern
        const nameNode = namedChildrenOf(node).find((c) =>
          ["identifier", "list_splat_pattern", "dictionary_splat_pattern"].includes(c.type)
        );
        return nameNode?.text ?? null;
      }
      default:
        return null;
    }
  }

  /**
   * Source text of a suite. A suite on its own lines starts on the line after
   * the header, so leading comments and the first line's indentation are kept.
   */
  private getSuiteText(definition: SyntaxNode, block: SyntaxNode): string {
    const colon = childrenOf(definition).find(
      (c) => c.type === ":" && c.startIndex < block.startIndex
    );
    const headerRow = (colon ?? definition).startPosition.row;

    if (block.startPosition.row > headerRow) {
      const headerEnd = this.sourceCode.indexOf("\n", (colon ?? definition).endIndex);
      const start =
        headerEnd >= 0 && headerEnd < block.startIndex
          ? headerEnd + 1
          : this.sourceCode.lastIndexOf("\n", block.startIndex - 1) + 1;
      return this.sourceCode.slice(start, block.endIndex);
    }
    return this.sourceCode.slice(block.startIndex, block.endIndex);
  }

  // ===========================================================================
  // Classes
  // ===========================================================================

  private parseClass(node: SyntaxNode): ClassRecord | null {
    const nameNode = node.childForFieldName("name");
    if (!nameNode) return null;

    const basesNode = node.childForFieldName("superclasses");
    const superclasses = basesNode
      ? namedChildrenOf(basesNode)
          .filter((c) => !NON_BASE_NODE_TYPES.has(c.type))
          .map((c) => c.text)
      : [];

    const bodyNode = node.childForFieldName("body");
    const methods: CallableRecord[] = [];
    const fields: FieldRecord[] = [];

    if (bodyNode) {
      for (const { node: member, decorators } of this.definitionsIn(bodyNode)) {
        if (member.type === "function_definition") {
          methods.push(this.parseCallable(member, decorators));
        }
      }
      for (const statement of namedChildrenOf(bodyNode)) {
        if (statement.type !== "expression_statement") continue;
        for (const expression of namedChildrenOf(statement)) {
          if (expression.type === "assignment") {
            fields.push(...this.parseAssignment(expression));
          }
        }
      }
    }

    return { identifier: nameNode.text, superclasses, fields, methods };
  }

  /**
   * Fields bound by one assignment statement; `a = b = 0` binds two.
   * Only plain names are fields: attribute, subscript and tuple targets are not.
   */
  private parseAssignment(assignment: SyntaxNode): FieldRecord[] {
    const fields: FieldRecord[] = [];
    let current: SyntaxNode | null = assignment;

    while (current && current.type === "assignment") {
      const left = current.childForFieldName("left");
      const typeNode = current.childForFieldName("type");
      if (left && left.type === "identifier") {
        fields.push({ identifier: left.text, type: typeNode ? typeNode.text : null });
      }
      current = current.childForFieldName("right");
    }

    return fields;
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates a PythonExtractor instance.
 */
export function createPythonExtractor(): PythonExtractor {
  return new PythonExtractor();
}
