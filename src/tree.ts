// ─── Document Tree Helpers ──────────────────────────────────────────────────
//
// Builders and read-only queries over the DocumentNode model. Traversals are
// iterative so that deeply nested sub-parser output cannot exhaust the stack.

import {
  type ChildNode,
  type DocumentNode,
  type NodeTag,
  DEFAULT_MARKER_LENGTH,
  PLACEHOLDER_ARGS_TAG,
  PLACEHOLDER_TAG,
} from './types.js';

// ─── Builders ───────────────────────────────────────────────────────────────

export function element(
  tag: NodeTag,
  attributes: Record<string, string> = {},
  children: ChildNode[] = [],
): DocumentNode {
  return { tag, attributes, children };
}

export function isElement(child: ChildNode): child is DocumentNode {
  return typeof child !== 'string';
}

/**
 * Append text to a node, merging with a trailing text run if there is one.
 */
export function appendText(node: DocumentNode, text: string): void {
  if (text === '') return;
  const last = node.children[node.children.length - 1];
  if (typeof last === 'string') {
    node.children[node.children.length - 1] = last + text;
  } else {
    node.children.push(text);
  }
}

/**
 * Build a raw-block placeholder the way the upstream tree builder does:
 * opening marker, directive line, raw body.
 */
export function createPlaceholder(
  body: string,
  directive: string,
  markerLength: number = DEFAULT_MARKER_LENGTH,
): DocumentNode {
  return element(PLACEHOLDER_TAG, {}, [
    '{'.repeat(markerLength),
    element(PLACEHOLDER_ARGS_TAG, {}, [directive]),
    body,
  ]);
}

// ─── Queries ────────────────────────────────────────────────────────────────

/** Concatenated text of every text run below `node`, in document order. */
export function textContent(node: ChildNode): string {
  if (typeof node === 'string') return node;
  let out = '';
  const stack: ChildNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    if (typeof current === 'string') {
      out += current;
      continue;
    }
    for (let i = current.children.length - 1; i >= 0; i--) {
      const child = current.children[i];
      if (child !== undefined) stack.push(child);
    }
  }
  return out;
}

/**
 * All elements below (and including) `root` matching `predicate`,
 * pre-order, left to right.
 */
export function findAll(
  root: DocumentNode,
  predicate: (node: DocumentNode) => boolean,
): DocumentNode[] {
  const found: DocumentNode[] = [];
  const stack: DocumentNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (predicate(node)) found.push(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child !== undefined && isElement(child)) stack.push(child);
    }
  }
  return found;
}

export function findFirst(root: DocumentNode, tag: NodeTag): DocumentNode | null {
  return findAll(root, (n) => n.tag === tag)[0] ?? null;
}

export function countPlaceholders(root: DocumentNode): number {
  return findAll(root, (n) => n.tag === PLACEHOLDER_TAG).length;
}

// ─── Outline Renderer ───────────────────────────────────────────────────────
//
// Indented, one-line-per-node dump used by the CLI and by tests:
//
//   page
//     table class="moin-csv-table moin-sortable"
//       table-header
//         table-row
//           table-cell
//             "a"

export function formatTree(root: DocumentNode, indent: string = '  '): string[] {
  const lines: string[] = [];
  const stack: Array<{ node: ChildNode; depth: number }> = [{ node: root, depth: 0 }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const { node, depth } = entry;
    const pad = indent.repeat(depth);

    if (typeof node === 'string') {
      lines.push(pad + JSON.stringify(node));
      continue;
    }

    const attrs = Object.keys(node.attributes)
      .sort()
      .map((key) => `${key}=${JSON.stringify(node.attributes[key])}`);
    lines.push(pad + [node.tag, ...attrs].join(' '));

    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child !== undefined) stack.push({ node: child, depth: depth + 1 });
    }
  }

  return lines;
}
