import { describe, it, expect } from 'vitest';
import { Keyv } from 'keyv';
import { KeyvSessionStore } from '../apps/viewer/src/session/keyv-store.js';
import type { Session } from '../apps/viewer/src/session/types.js';

function session(id: string): Session {
  return {
    id,
    createdAt: 1,
    lastSeenAt: 1,
    issuer: 'https://ehr.example/fhir',
    pending: { fhir: { state: 'state-1', codeVerifier: 'verifier-1', createdAt: 1 } },
  };
}

describe('KeyvSessionStore', () => {
  it('stores sessions under a prefixed key', async () => {
    const keyv = new Keyv();
    const store = new KeyvSessionStore(keyv, 60_000);

    await store.set('abc', session('abc'));

    expect(await store.get('abc')).toEqual(session('abc'));
    expect(await keyv.get('session:abc')).toEqual(session('abc'));
    expect(await keyv.get('abc')).toBeUndefined();
  });

  it('deletes sessions', async () => {
    const store = new KeyvSessionStore(new Keyv(), 60_000);
    await store.set('abc', session('abc'));

    await store.delete('abc');

    expect(await store.get('abc')).toBeUndefined();
  });

  it('lets the backend expire idle sessions', async () => {
    const store = new KeyvSessionStore(new Keyv(), 20);
    await store.set('abc', session('abc'));

    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(await store.get('abc')).toBeUndefined();
    expect(await store.sweep()).toBe(0);
  });
});
