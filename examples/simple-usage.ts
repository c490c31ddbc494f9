/**
 * Simple usage - sharing, deep copies, release
 */

import { SharedArray, createHeapAllocator } from '../packages/core/src/index';

console.log('=== sharray: Shared Arrays ===\n');

const heap = createHeapAllocator();

// ===== Bind a handle =====
console.log('1️⃣ Create a handle with 3 slots');
const a = new SharedArray<number>(3, { allocator: heap });
a.set(0, 10).set(1, 20).set(2, 30);
console.log('a:', a.toArray());

// ===== Share =====
console.log('\n2️⃣ Copy the handle (shares the store)');
const b = new SharedArray(a);
console.log('b:', b.toArray(), 'use count:', a.useCount);

a.set(1, 99);
console.log('after a[1] = 99 → b[1]:', b.get(1));
console.log('✅ Writes through a show through b');

// ===== Deep copy =====
console.log('\n3️⃣ Deep copy (independent store)');
const c = a.deepCopy();
a.set(1, 7);
console.log('a:', a.toArray());
console.log('c:', c.toArray());
console.log('✅ c keeps 99');

// ===== Release =====
console.log('\n4️⃣ Release every handle');
b.release();
console.log('after b.release():', heap.stats());
a.release();
c.release();
console.log('after a and c:', heap.stats());
console.log('✅ Both buffers freed');
