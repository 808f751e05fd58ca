import { describe, it, expect } from 'vitest';
import { toGraphviz } from '../graphviz.js';
import { IntrusiveAvlTree } from '../intrusive-avl-tree.js';
import { Item, compareByValue, insert, lessByValue, primaryTree } from './test-item.js';

const label = (item: Item): string => String(item.value);

function build(keys: number[]): IntrusiveAvlTree<Item, 'primary'> {
  return IntrusiveAvlTree.from('primary', (item: Item) => item.primary, keys.map(key => new Item(key)), lessByValue);
}

describe('toGraphviz', () => {
  it('should render an empty tree as an empty digraph', () => {
    expect(toGraphviz(primaryTree(), label)).toBe('digraph {\nnode[style=filled,fontcolor=white];\n\n\n}\n');
  });

  it('should render a level tree in black', () => {
    expect(toGraphviz(build([2, 1, 3]), label)).toBe(
      'digraph {\n' +
        'node[style=filled,fontcolor=white];\n' +
        '1[fillcolor=black];2[fillcolor=black];3[fillcolor=black];\n' +
        '2:sw->1:n;2:se->3:n;\n' +
        '}\n'
    );
  });

  it('should colour right-heavy nodes orange', () => {
    expect(toGraphviz(build([1, 2, 3, 4, 5]), label)).toBe(
      'digraph {\n' +
        'node[style=filled,fontcolor=white];\n' +
        '1[fillcolor=black];2[fillcolor=orange];3[fillcolor=black];4[fillcolor=black];5[fillcolor=black];\n' +
        '2:sw->1:n;2:se->4:n;4:sw->3:n;4:se->5:n;\n' +
        '}\n'
    );
  });

  it('should colour left-heavy nodes blue', () => {
    expect(toGraphviz(build([5, 3, 8, 1]), label)).toBe(
      'digraph {\n' +
        'node[style=filled,fontcolor=white];\n' +
        '1[fillcolor=black];3[fillcolor=blue];5[fillcolor=blue];8[fillcolor=black];\n' +
        '3:sw->1:n;5:sw->3:n;5:se->8:n;\n' +
        '}\n'
    );
  });

  it('should reflect the shape after an erase', () => {
    const tree = build([1, 2, 3, 4, 5, 6, 7]);
    tree.erase(tree.find(compareByValue(7)));

    expect(toGraphviz(tree, label)).toBe(
      'digraph {\n' +
        'node[style=filled,fontcolor=white];\n' +
        '1[fillcolor=black];2[fillcolor=black];3[fillcolor=black];4[fillcolor=black];5[fillcolor=black];6[fillcolor=blue];\n' +
        '2:sw->1:n;2:se->3:n;4:sw->2:n;4:se->6:n;6:sw->5:n;\n' +
        '}\n'
    );
  });

  it('should use the supplied labels', () => {
    const tree = primaryTree();
    insert(tree, new Item(1));
    expect(toGraphviz(tree, item => `k${item.value}`)).toBe(
      'digraph {\nnode[style=filled,fontcolor=white];\nk1[fillcolor=black];\n\n}\n'
    );
  });
});
