import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ResolutionCache } from '../../../src/core/resolution/resolution-cache.js';

describe('ResolutionCache', () => {
  it('shares one lookup between concurrent claims', async () => {
    const cache = new ResolutionCache<string>();
    let lookups = 0;
    const resolve = async (): Promise<string> => {
      lookups++;
      return 'value';
    };

    const [first, second] = await Promise.all([cache.claim('k', resolve), cache.claim('k', resolve)]);
    assert.equal(first, 'value');
    assert.equal(second, 'value');
    assert.equal(lookups, 1);
    assert.equal(cache.lookupCount, 1);
    assert.ok(cache.has('k'));
  });

  it('keeps keys independent', async () => {
    const cache = new ResolutionCache<string>();
    assert.equal(await cache.claim('a', async () => 'A'), 'A');
    assert.equal(await cache.claim('b', async () => 'B'), 'B');
    assert.equal(cache.lookupCount, 2);
  });

  it('releases the claim of a failed lookup', async () => {
    const cache = new ResolutionCache<string>();
    await assert.rejects(cache.claim('k', async () => {
      throw new Error('unreachable host');
    }), { message: 'unreachable host' });

    assert.equal(cache.has('k'), false);
    assert.equal(await cache.claim('k', async () => 'retried'), 'retried');
    assert.equal(cache.lookupCount, 2);
  });
});
