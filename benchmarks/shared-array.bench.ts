/**
 * Benchmark: sharing a handle vs copying the data
 * Native slice and immer's produce are the baselines
 */

import { bench, describe } from 'vitest';
import { produce as immerProduce } from 'immer';
import { SharedArray, CloneContext } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 10000;
const nativeArr = Array.from({ length: SIZE }, (_, i) => i);
const sharedArr = SharedArray.fromArray(nativeArr);

describe('Second owner of 10000 items', () => {
  bench('Native (slice)', () => {
    nativeArr.slice();
  });

  bench('SharedArray (share)', () => {
    const b = new SharedArray(sharedArr);
    b.release();
  });

  bench('SharedArray (deepCopy)', () => {
    const b = sharedArr.deepCopy();
    b.release();
  });
});

describe('Independent copy with one update at index 5000', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    copy[5000] = -1;
  });

  bench('SharedArray deepCopy()', () => {
    const copy = sharedArr.deepCopy();
    copy.set(5000, -1);
    copy.release();
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, draft => {
      draft[5000] = -1;
    });
  });
});

// ===== Clone pass =====
describe('Clone 100 handles over 10 stores', () => {
  const stores = Array.from({ length: 10 }, (_, i) =>
    SharedArray.fromArray(Array.from({ length: 1000 }, (_, j) => i * 1000 + j))
  );
  const handles = Array.from({ length: 100 }, (_, i) => new SharedArray(stores[i % 10]));

  bench('update(share = true)', () => {
    const copies = CloneContext.run(context =>
      handles.map(h => new SharedArray<number>().update(context, true, h))
    );
    for (const c of copies) c.release();
  });

  bench('update(share = false)', () => {
    const copies = CloneContext.run(context =>
      handles.map(h => new SharedArray<number>().update(context, false, h))
    );
    for (const c of copies) c.release();
  });
});
