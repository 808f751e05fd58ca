import { LEFT, RIGHT } from './avl-link.js';
import type { ReadonlyIntrusiveAvlTree } from './intrusive-avl-tree.js';

function fillColor(balance: number): string {
  if (balance === 0) return 'black';
  return balance < 0 ? 'blue' : 'orange';
}

/**
 * Renders a tree as a Graphviz digraph for debugging.
 *
 * Nodes are filled by balance factor (black level, blue left-heavy, orange
 * right-heavy); edges leave a parent's south-west or south-east corner.
 * Paste the output into any "dot" engine.
 *
 * @param label - Node identifier for an element; must be unique and a valid dot ID
 */
export function toGraphviz<T, Tag extends string>(
  tree: ReadonlyIntrusiveAvlTree<T, Tag>,
  label: (element: T) => string
): string {
  const nodes: string[] = [];
  const edges: string[] = [];

  const end = tree.end();
  for (const cursor = tree.begin(); !cursor.equals(end); cursor.increment()) {
    const name = label(cursor.value);
    nodes.push(`${name}[fillcolor=${fillColor(cursor.getBalanceFactor())}];`);

    const left = cursor.getChild(LEFT);
    if (left.hasValue()) edges.push(`${name}:sw->${label(left.value)}:n;`);
    const right = cursor.getChild(RIGHT);
    if (right.hasValue()) edges.push(`${name}:se->${label(right.value)}:n;`);
  }

  return [
    'digraph {',
    'node[style=filled,fontcolor=white];',
    nodes.join(''),
    edges.join(''),
    '}',
    '',
  ].join('\n');
}
