import { parseArgs } from 'node:util';
import type { Logger } from 'pino';
import { AvlLink } from './core/avl-link.js';
import { toGraphviz } from './core/graphviz.js';
import { IntrusiveAvlTree } from './core/intrusive-avl-tree.js';
import { verifyTree } from './core/invariants.js';
import { AvlTreeError, getErrorMessage } from './utils/error-utils.js';

export const USAGE = 'Usage: avl-dot [--verify] [--erase <key>]... <key>...';

export interface CliIo {
  stdout: (text: string) => void;
  logger: Logger;
  verify?: boolean;
}

/** Element type for the keys given on the command line. */
export class KeyNode {
  readonly link = new AvlLink<KeyNode, 'key'>(this, 'key');

  constructor(readonly key: number) {}
}

const byKey = (a: KeyNode, b: KeyNode): number => a.key - b.key;

function parseKey(text: string): number {
  const key = Number(text);
  if (text.trim() === '' || !Number.isFinite(key)) {
    throw new Error(`Not a finite number: '${text}'`);
  }
  return key;
}

/**
 * avl-dot: links the given keys into a tree (duplicates dropped), erases the
 * --erase keys, verifies the result and prints it as a Graphviz digraph.
 * @returns Process exit code: 0 on success, 1 on a tree error, 2 on bad usage
 */
export function run(args: string[], io: CliIo): number {
  const { stdout, logger } = io;

  let keys: number[];
  let eraseKeys: number[];
  let verify: boolean;
  try {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        erase: { type: 'string', multiple: true },
        verify: { type: 'boolean' },
      },
    });
    keys = positionals.map(parseKey);
    eraseKeys = (values.erase ?? []).map(parseKey);
    verify = values.verify ?? io.verify ?? false;
  } catch (error) {
    logger.error(getErrorMessage(error));
    logger.error(USAGE);
    return 2;
  }

  try {
    const tree = new IntrusiveAvlTree<KeyNode, 'key'>('key', node => node.link, {
      logger,
      verify,
      order: byKey,
    });

    const linked = tree.assign(keys.map(key => new KeyNode(key)), (a, b) => a.key < b.key);
    if (linked < keys.length) {
      logger.debug({ dropped: keys.length - linked }, 'Duplicate keys dropped');
    }

    for (const key of eraseKeys) {
      const position = tree.find(node => key - node.key);
      if (position.equals(tree.end())) {
        logger.warn({ key }, 'Key not present, nothing erased');
        continue;
      }
      tree.erase(position);
    }

    const height = verifyTree(tree, byKey);
    logger.info({ size: tree.getSize(), height }, 'Tree built');

    stdout(toGraphviz(tree, node => String(node.key)));
    return 0;
  } catch (error) {
    if (error instanceof AvlTreeError) {
      logger.error({ code: error.code }, error.message);
      return 1;
    }
    throw error;
  }
}
