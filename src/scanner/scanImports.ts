import { readFileSync } from 'node:fs';
import type Parser from 'tree-sitter';

import { PackagerError, errorMessage } from '../errors.js';
import { getPythonParser } from './loadParser.js';
import type { ImportedName, ScanOptions } from './scannerTypes.js';

type SyntaxNode = Parser.SyntaxNode;

function defaultReadFile(path: string): string {
  return readFileSync(path, 'utf8');
}

// `a . b` is legal Python; the canonical name has no whitespace.
function nameText(node: SyntaxNode): string {
  return node.text.replace(/\s+/g, '');
}

function importedModule(node: SyntaxNode): string {
  // `import a.b as c` -> aliased_import(name: dotted_name)
  if (node.type === 'aliased_import') {
    const target = node.childForFieldName('name');
    return target ? nameText(target) : '';
  }
  return nameText(node);
}

class ImportCollector {
  private readonly byModule = new Map<string, ImportedName>();

  add(module: string, members: string[], line: number) {
    if (!module) return;
    const existing = this.byModule.get(module);
    if (!existing) {
      this.byModule.set(module, { module, members: [...new Set(members)], line });
      return;
    }
    for (const m of members) {
      if (!existing.members.includes(m)) existing.members.push(m);
    }
  }

  result(): ImportedName[] {
    return [...this.byModule.values()];
  }
}

function isNameNode(node: SyntaxNode): boolean {
  return node.type === 'dotted_name' || node.type === 'aliased_import';
}

function collectImport(node: SyntaxNode, out: ImportCollector) {
  const line = node.startPosition.row + 1;

  if (node.type === 'import_statement') {
    for (const name of node.namedChildren.filter(isNameNode)) {
      out.add(importedModule(name), [], line);
    }
    return;
  }

  // import_from_statement
  const moduleNode = node.childForFieldName('module_name');
  if (!moduleNode) return;

  const wildcard = node.namedChildren.some((c) => c.type === 'wildcard_import');
  const members = wildcard
    ? ['*']
    : node.namedChildren
        .filter((c) => isNameNode(c) && c.startIndex !== moduleNode.startIndex)
        .map((c) => importedModule(c))
        .filter(Boolean);

  out.add(nameText(moduleNode), members, line);
}

/**
 * Extract the modules a Python file imports, without running it.
 *
 * Walks the whole tree so imports inside functions, `try` and `if` blocks are
 * found too. `from __future__ import ...` is a compiler directive and is skipped.
 */
export function scanSource(source: string): ImportedName[] {
  const parser = getPythonParser();
  const tree = parser.parse(source, undefined, {
    bufferSize: Math.max(32 * 1024, source.length + 1),
  });

  const out = new ImportCollector();
  const stack: SyntaxNode[] = [tree.rootNode];

  while (stack.length) {
    const node = stack.pop();
    if (!node) break;

    if (node.type === 'import_statement' || node.type === 'import_from_statement') {
      collectImport(node, out);
      continue;
    }

    // Reverse so that the pop order matches source order.
    const children = node.namedChildren;
    for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
  }

  return out.result();
}

export function scanImports(path: string, options: ScanOptions = {}): ImportedName[] {
  const readFile = options.readFile ?? defaultReadFile;

  let source: string;
  try {
    source = readFile(path);
  } catch (err) {
    throw new PackagerError('SOURCE_UNREADABLE', `Cannot read source ${path}: ${errorMessage(err)}`, {
      path,
      cause: errorMessage(err),
    });
  }

  return scanSource(source);
}
