import { TraversalEntry, TreeKey, TreeVisitor } from '../common/Types';

export interface Traversable<K> {
  traverse(visitor: TreeVisitor<K>): void;
}

export type KeyFormatter<K> = (key: K) => string;

const INDENT = 4;
const NODE_LABEL = 'Node       ';
const KEY_LABEL = 'Key:       ';

/**
 * Renders a pre-order dump of a tree: each node's id and key, followed by
 * its left and right subtrees indented one level, "null" for absent children.
 */
export class TreeDebugPrinter<K extends TreeKey> {
  private readonly formatKey: KeyFormatter<K>;

  constructor(formatKey: KeyFormatter<K> = String) {
    this.formatKey = formatKey;
  }

  render(tree: Traversable<K>): string {
    const lines: string[] = [];
    tree.traverse((entry) => this.renderEntry(entry, lines));
    return lines.map((line) => `${line}\n`).join('');
  }

  print(tree: Traversable<K>, out: NodeJS.WritableStream): void {
    out.write(this.render(tree));
  }

  private renderEntry(entry: TraversalEntry<K>, lines: string[]): void {
    const pad = ' '.repeat(entry.depth * INDENT);

    if (entry.side !== 'root') {
      const parentPad = ' '.repeat((entry.depth - 1) * INDENT);
      lines.push(`${parentPad}${entry.side === 'left' ? 'Left Child:' : 'Right Child:'}`);
    }

    if (entry.node === null) {
      lines.push(`${pad}null`);
      return;
    }

    lines.push(`${pad}${NODE_LABEL}#${entry.node.id}`);
    lines.push(`${pad}${KEY_LABEL}${this.formatKey(entry.node.key)}`);
  }
}
