/**
 * Callable Provider
 *
 * Writes the body of every callable in a dataset to a file of its own, laid
 * out as `<repository>/<module>/[<class>/]<callable>.py`. Bodies can be
 * written with their type annotations removed.
 *
 * @module
 */

import * as path from "node:path";
import type { Node } from "web-tree-sitter";
import type { Callable, ClassEntity, ModuleEntity, Repository } from "../models/entities.js";
import { ParsingError } from "../errors.js";
import { createParserManager, type ParserManager } from "../parser/parser-manager.js";
import { childrenOf, findSyntaxError } from "../parser/python-extractor.js";
import { err, ok, type Result } from "../../types/result.js";
import { writeFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("provide");

// =============================================================================
// Types
// =============================================================================

export interface ProvideOptions {
  outputDir: string;
  /** Remove parameter, return and variable annotations from each body */
  withoutTypeAnnotations?: boolean;
  /** Shared parser; one is created and closed for the call when omitted */
  parserManager?: ParserManager;
}

export interface ProvideResult {
  /** Relative `/`-separated paths written, in dataset order */
  files: string[];
  /** Files written as stored because their body could not be parsed */
  unstripped: string[];
}

// =============================================================================
// Paths
// =============================================================================

/**
 * Output path of one callable. Callables that share a path overwrite each
 * other; the last one in dataset order wins.
 */
export function callablePath(
  repository: Repository,
  module: ModuleEntity,
  owner: ClassEntity | null,
  callable: Callable
): string {
  const segments = owner
    ? [repository.name, module.name, owner.identifier, callable.identifier]
    : [repository.name, module.name, callable.identifier];
  return `${segments.join("/")}.py`;
}

// =============================================================================
// Annotation Removal
// =============================================================================

/** Nodes that can carry an annotation, the token that introduces it, and its field */
const ANNOTATED_NODES: Record<string, { marker: string; field: string }> = {
  typed_parameter: { marker: ":", field: "type" },
  typed_default_parameter: { marker: ":", field: "type" },
  assignment: { marker: ":", field: "type" },
  function_definition: { marker: "->", field: "return_type" },
};

/**
 * Source ranges to delete, each running from the end of the annotated name
 * (or parameter list) to the end of the annotation.
 */
function annotationSpans(root: Node): Array<[number, number]> {
  const spans: Array<[number, number]> = [];
  const stack: Node[] = [root];

  for (let node = stack.pop(); node; node = stack.pop()) {
    const annotated = ANNOTATED_NODES[node.type];
    const typeNode = annotated ? node.childForFieldName(annotated.field) : null;
    if (annotated && typeNode) {
      const children = childrenOf(node);
      const markerIndex = children.findIndex((child) => child.type === annotated.marker);
      const marker = children[markerIndex];
      if (marker) {
        spans.push([children[markerIndex - 1]?.endIndex ?? marker.startIndex, typeNode.endIndex]);
      }
    }
    stack.push(...childrenOf(node));
  }

  return spans.sort((a, b) => a[0] - b[0]);
}

/**
 * Removes parameter, return and variable annotations from a callable body.
 * The body is parsed inside a placeholder `def` so that an indented suite
 * is valid on its own.
 */
export function stripTypeAnnotations(
  manager: ParserManager,
  body: string,
  filePath: string
): Result<string, ParsingError> {
  const prefix = /^\s/.test(body) ? "def _():\n" : "def _(): ";
  const wrapped = prefix + body;
  const { tree } = manager.parseCode(wrapped);
  try {
    const diagnostic = findSyntaxError(tree, wrapped);
    if (diagnostic) {
      return err(new ParsingError(diagnostic.message, { filePath }));
    }

    let text = wrapped;
    for (const [start, end] of annotationSpans(tree.rootNode).reverse()) {
      text = text.slice(0, start) + text.slice(end);
    }
    return ok(text.slice(prefix.length));
  } finally {
    tree.delete();
  }
}

// =============================================================================
// Provider
// =============================================================================

function collectBodies(repositories: readonly Repository[]): Map<string, string> {
  const bodies = new Map<string, string>();
  for (const repository of repositories) {
    for (const module of repository.modules) {
      for (const owner of module.classes) {
        for (const method of owner.methods) {
          bodies.set(callablePath(repository, module, owner, method), method.body);
        }
      }
      for (const fn of module.functions) {
        bodies.set(callablePath(repository, module, null, fn), fn.body);
      }
    }
  }
  return bodies;
}

/**
 * Writes one file per callable under `outputDir`.
 *
 * @example
 * ```typescript
 * const repositories = await readDataset("dataset.json");
 * const { files } = await provideCallables(repositories, {
 *   outputDir: "out",
 *   withoutTypeAnnotations: true,
 * });
 * ```
 */
export async function provideCallables(
  repositories: readonly Repository[],
  options: ProvideOptions
): Promise<ProvideResult> {
  const bodies = collectBodies(repositories);
  const result: ProvideResult = { files: [], unstripped: [] };

  const manager = options.withoutTypeAnnotations
    ? (options.parserManager ?? createParserManager())
    : null;
  try {
    await manager?.initialize();

    for (const [relativePath, body] of bodies) {
      let code = body;
      if (manager) {
        const stripped = stripTypeAnnotations(manager, body, relativePath);
        if (stripped.ok) {
          code = stripped.value;
        } else {
          logger.warn({ filePath: relativePath, err: stripped.error }, "Keeping annotations of unparsable body");
          result.unstripped.push(relativePath);
        }
      }
      await writeFile(path.join(options.outputDir, ...relativePath.split("/")), `${code}\n`);
      result.files.push(relativePath);
    }
  } finally {
    if (manager && options.parserManager === undefined) {
      await manager.close();
    }
  }

  logger.info({ outputDir: options.outputDir, count: result.files.length }, "Callables written");
  return result;
}
