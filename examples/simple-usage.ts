/**
 * Simple usage - persistent collections, transients and produce()
 */

import { LazyMap, PList, PMap, PSet, Trie, lazy, produce } from '../packages/core/src/index';

console.log('=== stratum: persistent collections ===\n');

// ===== The engine =====
console.log('1️⃣ Every edit returns a new trie');
const t0 = Trie.empty<number, string>();
const t1 = t0.set(1, 'a');
const t2 = t1.set(2, 'b');
const t3 = t2.delete(1);
console.log('sizes:', t0.size, t1.size, t2.size, t3.size);
console.log('t2.get(1):', t2.get(1), '| t3.get(1):', t3.get(1));
console.log('✅ Older versions are untouched');

// ===== Batch edits =====
console.log('\n2️⃣ Batch edits with a transient');
const session = t3.transient();
for (let i = 10; i < 20; i++) session.set(i, `v${i}`);
session.delete(2);
const t4 = session.freeze();
console.log('t4:', t4.toString(), '| t3:', t3.toString());
try {
  session.set(99, 'late');
} catch (err) {
  console.log('After freeze:', err instanceof Error ? err.message : err);
}

// ===== Maps keep insertion order =====
console.log('\n3️⃣ PMap keeps insertion order');
const prefs = PMap.of({ theme: 'dark', lang: 'en' });
const updated = produce(prefs, (draft) => {
  draft.set('lang', 'fr');
  draft.set('font', 'mono');
});
console.log('prefs:', prefs.toString());
console.log('updated:', updated.toString());
console.log('prefs === produce(prefs, noop):', prefs === produce(prefs, () => undefined));

// ===== Sets =====
console.log('\n4️⃣ PSet algebra');
const a = PSet.of(1, 2, 3);
const b = PSet.of(3, 4);
console.log('union:', a.union(b).toString());
console.log('intersection:', a.intersection(b).toString());
console.log('compare:', a.compare(b));

// ===== Lists =====
console.log('\n5️⃣ PList');
const list = PList.of('x', 'y', 'z').prepend('w').insert(2, 'mid');
console.log('list:', list.toString(), '| last:', list.get(-1));

// ===== Lazy values =====
console.log('\n6️⃣ Lazy values are computed once, on demand');
let calls = 0;
const report = LazyMap.from<string, number>([
  ['cheap', 1],
  [
    'costly',
    lazy((n: number) => {
      calls++;
      return n * n;
    }, 12),
  ],
]);
console.log('before:', report.toString(), '| calls:', calls);
console.log('costly:', report.get('costly'), report.get('costly'), '| calls:', calls);
console.log('after:', report.toString());
