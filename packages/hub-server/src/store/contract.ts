import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { IProfileStore } from './types.js';
import type { AgentRecord, Profile } from '../types.js';

function profile(name: string, experiences: Profile['experiences'] = []): Profile {
  return { name, personality: `${name} personality`, values: `${name} values`, experiences };
}

function agent(agentId: string, agentType = 'freigent'): AgentRecord {
  return { agentId, agentType, displayName: agentId.toUpperCase(), personalitySummary: '' };
}

/**
 * Shared contract tests: every IProfileStore implementation must pass these.
 * Call this from each adapter's test file, passing a factory that returns
 * a fresh, empty store before each test.
 */
export function runStoreContractTests(
  label: string,
  factory: () => Promise<IProfileStore>,
): void {
  describe(label, () => {
    let store: IProfileStore;
    beforeEach(async () => { store = await factory(); });
    afterEach(async () => { await store.close(); });

    // ─── Profiles ───────────────────────────────────────────────────────────

    describe('profiles', () => {
      it('stores and loads a profile with its experiences', async () => {
        const p = profile('dana', [{ name: 'Trail shoes', notes: 'comfy', rating: 5 }]);
        await store.upsertProfile('u1', p);
        expect(await store.loadProfile('u1')).toEqual(p);
      });

      it('returns null for an unknown user', async () => {
        expect(await store.loadProfile('nobody')).toBeNull();
      });

      it('upsert replaces the profile and all experiences', async () => {
        await store.upsertProfile('u1', profile('dana', [
          { name: 'Kettle', notes: 'loud', rating: 2 },
          { name: 'Mug', notes: 'fine', rating: 3 },
        ]));
        await store.upsertProfile('u1', profile('dana r', [{ name: 'Tent', notes: 'dry', rating: 4 }]));

        const loaded = await store.loadProfile('u1');
        expect(loaded?.name).toBe('dana r');
        expect(loaded?.experiences).toEqual([{ name: 'Tent', notes: 'dry', rating: 4 }]);
      });

      it('lists stored profile ids', async () => {
        await store.upsertProfile('u1', profile('a'));
        await store.upsertProfile('u2', profile('b'));
        expect(await store.listProfileIds()).toEqual(expect.arrayContaining(['u1', 'u2']));
        expect(await store.listProfileIds()).toHaveLength(2);
      });
    });

    // ─── Agents ─────────────────────────────────────────────────────────────

    describe('agents', () => {
      it('stores and retrieves an agent', async () => {
        await store.upsertAgent(agent('u1'));
        expect(await store.getAgent('u1')).toEqual(agent('u1'));
      });

      it('returns null for an unknown agent', async () => {
        expect(await store.getAgent('nobody')).toBeNull();
      });

      it('upsert overwrites the agent record', async () => {
        await store.upsertAgent(agent('u1'));
        await store.upsertAgent({ ...agent('u1'), displayName: 'Renamed' });
        expect((await store.getAgent('u1'))?.displayName).toBe('Renamed');
      });
    });

    // ─── Peer discovery ─────────────────────────────────────────────────────

    describe('listPeerIds', () => {
      beforeEach(async () => {
        for (const id of ['u1', 'u2', 'u3']) {
          await store.upsertAgent(agent(id));
          await store.upsertProfile(id, profile(id));
        }
      });

      it('returns other agents of the same type in first-stored order', async () => {
        expect(await store.listPeerIds('u1', 'freigent')).toEqual(['u2', 'u3']);
      });

      it('excludes agents of another type', async () => {
        await store.upsertAgent(agent('u2', 'scout'));
        expect(await store.listPeerIds('u1', 'freigent')).toEqual(['u3']);
      });

      it('excludes agents without a stored profile', async () => {
        await store.upsertAgent(agent('u4'));
        expect(await store.listPeerIds('u1', 'freigent')).toEqual(['u2', 'u3']);
      });

      it('re-storing an agent keeps its position', async () => {
        await store.upsertAgent({ ...agent('u2'), displayName: 'again' });
        expect(await store.listPeerIds('u3', 'freigent')).toEqual(['u1', 'u2']);
      });

      it('returns an empty list when the base is the only agent', async () => {
        const fresh = await factory();
        await fresh.upsertAgent(agent('solo'));
        await fresh.upsertProfile('solo', profile('solo'));
        expect(await fresh.listPeerIds('solo', 'freigent')).toEqual([]);
        await fresh.close();
      });
    });
  });
}
