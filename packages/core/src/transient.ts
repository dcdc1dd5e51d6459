/**
 * TransientTrie - single-owner batch edit session over a Trie
 */

import {
  Edit,
  hamtDelete,
  hamtFind,
  hamtSet,
  hamtUpdate,
  type HMap,
} from './internal';
import { Trie } from './trie';

/**
 * A mutable view of a {@link Trie} snapshot.
 *
 * The first edit to a shared node copies it (and its path to the root) into
 * session-owned storage; later edits along that path happen in place. The
 * base trie and every other trie stay untouched. After {@link freeze} the
 * session is closed and every further call throws `TransientClosedError`.
 *
 * A session must stay with one owner from `open` to `freeze`.
 */
export class TransientTrie<K, V> {
  private map: HMap<K, V>;
  private readonly edit = new Edit('TransientTrie');

  private constructor(readonly base: Trie<K, V>) {
    this.map = { root: base.root, size: base.size, ops: base.ops };
  }

  static open<K, V>(trie: Trie<K, V>): TransientTrie<K, V> {
    return new TransientTrie(trie);
  }

  get isFrozen(): boolean {
    return !this.edit.isOpen;
  }

  get size(): number {
    this.edit.assertOpen();
    return this.map.size;
  }

  get(key: K): V | undefined;
  get<D>(key: K, notFound: D): V | D;
  get<D>(key: K, notFound?: D): V | D | undefined {
    this.edit.assertOpen();
    const e = hamtFind(this.map, key);
    return e ? e.value : notFound;
  }

  has(key: K): boolean {
    this.edit.assertOpen();
    return hamtFind(this.map, key) !== undefined;
  }

  set(key: K, value: V): this {
    this.edit.assertOpen();
    this.map = hamtSet(this.map, this.edit, key, value);
    return this;
  }

  update(key: K, fn: (value: V | undefined) => V): this {
    this.edit.assertOpen();
    this.map = hamtUpdate(this.map, this.edit, key, fn);
    return this;
  }

  /** Removes `key`; returns whether it was present. */
  delete(key: K): boolean {
    this.edit.assertOpen();
    const before = this.map.size;
    this.map = hamtDelete(this.map, this.edit, key);
    return this.map.size !== before;
  }

  /** Closes the session and publishes its contents as a persistent trie. */
  freeze(): Trie<K, V> {
    this.edit.assertOpen();
    this.edit.close();
    const { map } = this;
    if (map.root === this.base.root) return this.base;
    return new Trie(map);
  }
}
