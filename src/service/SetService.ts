/**
 * SetService - string-keyed facade over one in-memory ScapegoatTree
 *
 * The HTTP layer only deals in raw path segments; parsing them into tree
 * keys, and formatting keys back for the debug dump, happens here.
 */

import { TreeConfig } from '../common/Config';
import { RebuildEvent, TreeKey, TreeStats } from '../common/Types';
import {
  ISetService,
  InsertResult,
  RemoveResult,
  SearchResult,
} from '../interfaces/OrderedSet';
import { KeySchema } from '../factory/KeySchemas';
import { ScapegoatTree } from '../tree/ScapegoatTree';
import { TreeDebugPrinter } from '../tree/TreeDebugPrinter';

export interface SetServiceOptions {
  tree: TreeConfig;
  verbose?: boolean;
}

export class SetService<K extends TreeKey> implements ISetService {
  private readonly schema: KeySchema<K>;
  private readonly tree: ScapegoatTree<K>;
  private readonly printer: TreeDebugPrinter<K>;
  private readonly verbose: boolean;

  constructor(schema: KeySchema<K>, options: SetServiceOptions) {
    this.schema = schema;
    this.verbose = options.verbose ?? false;
    this.tree = new ScapegoatTree<K>(options.tree.alpha, schema.isLessThan, {
      onRebuild: (event) => this.logRebuild(event),
    });
    this.printer = new TreeDebugPrinter<K>((key) => schema.format(key));
  }

  search(rawKey: string): SearchResult {
    const key = this.schema.parse(rawKey);
    return { key: rawKey, present: this.tree.search(key) };
  }

  insert(rawKey: string): InsertResult {
    const key = this.schema.parse(rawKey);
    return { key: rawKey, inserted: this.tree.insert(key) };
  }

  remove(rawKey: string): RemoveResult {
    const key = this.schema.parse(rawKey);
    return { key: rawKey, removed: this.tree.remove(key) };
  }

  verify(): boolean {
    return this.tree.verify();
  }

  stats(): TreeStats {
    return this.tree.getStats();
  }

  debugDump(): string {
    return this.printer.render(this.tree);
  }

  clear(): void {
    this.tree.clear();
  }

  private logRebuild(event: RebuildEvent): void {
    if (!this.verbose) return;

    const scope = event.wholeTree ? 'whole tree' : 'subtree';
    console.log(
      `Rebuilt ${scope} of ${event.subtreeSize} nodes after ${event.trigger} (size ${event.treeSize})`
    );
  }
}
