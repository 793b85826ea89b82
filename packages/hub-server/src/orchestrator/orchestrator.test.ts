import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Orchestrator, mergedSummary } from './orchestrator.js';
import { RecommendationWorker, requestPayload } from '../worker/index.js';
import { MessagingHub } from '../hub/index.js';
import { MemoryProfileStore } from '../store/index.js';
import { ProfileNotFoundError } from '../errors.js';
import { FakeRecommender, makeProfile, productFor } from '../test-helpers.js';
import type { Profile } from '../types.js';

describe('Orchestrator', () => {
  let hub: MessagingHub;
  let store: MemoryProfileStore;
  let recommender: FakeRecommender;
  let worker: RecommendationWorker;
  let orchestrator: Orchestrator;

  const dana = makeProfile('Dana');

  async function addAgent(id: string, profile: Profile | null, agentType = 'freigent'): Promise<void> {
    await store.upsertAgent({ agentId: id, agentType, displayName: id, personalitySummary: '' });
    if (profile) await store.upsertProfile(id, profile);
  }

  beforeEach(async () => {
    hub = new MessagingHub();
    store = new MemoryProfileStore();
    recommender = new FakeRecommender();
    worker = new RecommendationWorker({ hub, store, recommender });
    orchestrator = new Orchestrator({ hub, store, recommender, worker });
    await addAgent('u1', dana);
  });

  it('merges the base result with one peer answer', async () => {
    await addAgent('u2', makeProfile('Remy'));

    const result = await orchestrator.run('u1', 'Q');

    const baseProduct = productFor(dana, 'Q', 1);
    // the peer answers with the requester's profile
    const peerProduct = productFor(dana, 'Q', 2);
    expect(result.baseAgentId).toBe('u1');
    expect(result.helperAgentIds).toEqual(['u2']);
    expect(result.baseResult).toEqual({ products: [baseProduct], summary_for_user: 'Summary for Dana' });
    expect(result.helperResults).toEqual([
      { agentId: 'u2', result: { products: [peerProduct], summary_for_user: 'Summary for Dana' } },
    ]);
    expect(result.mergedProducts).toEqual([baseProduct, peerProduct]);
    expect(result.mergedSummaryForUser).toBe(
      "This response combines the base Freigent 'u1' recommendations with 1 helper Freigent(s): u2.",
    );
  });

  it('returns the base result alone when there are no peers', async () => {
    const result = await orchestrator.run('u1', 'Q');

    expect(result.helperAgentIds).toEqual([]);
    expect(result.helperResults).toEqual([]);
    expect(result.mergedProducts).toEqual(result.baseResult.products);
    expect(result.mergedSummaryForUser).toBe(
      "This response combines the base Freigent 'u1' recommendations with 0 helper Freigent(s): none.",
    );
  });

  it('fails with ProfileNotFoundError when the base profile is missing', async () => {
    await addAgent('u2', makeProfile('Remy'));

    await expect(orchestrator.run('nobody', 'Q')).rejects.toBeInstanceOf(ProfileNotFoundError);
    expect(recommender.calls).toHaveLength(0);
    expect(hub.pending('u2')).toBe(0);
  });

  it('lets a failing base lookup propagate', async () => {
    vi.spyOn(store, 'loadProfile').mockRejectedValueOnce(new Error('store offline'));
    await expect(orchestrator.run('u1', 'Q')).rejects.toThrow('store offline');
  });

  it('keeps discovery order for helpers and merged products', async () => {
    await addAgent('u3', makeProfile('C'));
    await addAgent('u2', makeProfile('B'));
    await addAgent('u4', makeProfile('D'));

    const result = await orchestrator.run('u1', 'Q');

    expect(result.helperAgentIds).toEqual(['u3', 'u2', 'u4']);
    expect(result.helperResults.map((h) => h.agentId)).toEqual(['u3', 'u2', 'u4']);
    expect(result.mergedProducts.map((p) => p.name)).toEqual([
      'Dana: Q #1', 'Dana: Q #2', 'Dana: Q #3', 'Dana: Q #4',
    ]);
    expect(result.mergedSummaryForUser).toBe(
      "This response combines the base Freigent 'u1' recommendations with 3 helper Freigent(s): u3, u2, u4.",
    );
  });

  it('only consults peers of the configured agent type', async () => {
    await addAgent('u2', makeProfile('B'), 'scout');
    await addAgent('u3', makeProfile('C'));

    expect((await orchestrator.run('u1', 'Q')).helperAgentIds).toEqual(['u3']);

    const scouts = new Orchestrator({ hub, store, recommender, worker }, { agentType: 'scout' });
    expect((await scouts.run('u1', 'Q')).helperAgentIds).toEqual(['u2']);
  });

  it('registers peers in the hub with their profile fields', async () => {
    await addAgent('u2', makeProfile('Remy', { personality: 'thrifty' }));

    await orchestrator.run('u1', 'Q');

    expect(hub.getAgent('u2')).toEqual({
      agentId: 'u2',
      agentType: 'freigent',
      displayName: 'Remy',
      personalitySummary: 'thrifty',
    });
  });

  it('lists a peer whose profile vanished after discovery but gets nothing from it', async () => {
    await addAgent('u2', makeProfile('B'));
    await addAgent('u3', makeProfile('C'));
    const load = store.loadProfile.bind(store);
    vi.spyOn(store, 'loadProfile').mockImplementation(async (id) => (id === 'u2' ? null : load(id)));

    const result = await orchestrator.run('u1', 'Q');

    expect(result.helperAgentIds).toEqual(['u2', 'u3']);
    expect(result.helperResults.map((h) => h.agentId)).toEqual(['u3']);
    expect(result.mergedSummaryForUser.endsWith('with 1 helper Freigent(s): u2, u3.')).toBe(true);
    expect(hub.getAgent('u2')).toBeUndefined();
    expect(hub.pending('u2')).toBe(0);
  });

  it('isolates a peer whose worker pass fails', async () => {
    await addAgent('u2', makeProfile('B'));
    await addAgent('u3', makeProfile('C'));
    const process = worker.process.bind(worker);
    vi.spyOn(worker, 'process').mockImplementation(async (id, max) => {
      if (id === 'u2') throw new Error('worker crashed');
      return process(id, max);
    });

    const result = await orchestrator.run('u1', 'Q');

    expect(result.helperResults.map((h) => h.agentId)).toEqual(['u3']);
    expect(result.mergedProducts).toHaveLength(2);
  });

  it('degrades a failing base recommendation to an empty result', async () => {
    recommender.failFor.add('Dana');

    const result = await orchestrator.run('u1', 'Q');

    expect(result.baseResult.products).toEqual([]);
    expect(result.baseResult.summary_for_user.endsWith('Error: generation failed for Dana')).toBe(true);
  });

  it('treats a failing peer discovery as no peers', async () => {
    await addAgent('u2', makeProfile('B'));
    vi.spyOn(store, 'listPeerIds').mockRejectedValue(new Error('index corrupt'));

    const result = await orchestrator.run('u1', 'Q');

    expect(result.helperAgentIds).toEqual([]);
    expect(result.mergedProducts).toEqual(result.baseResult.products);
  });

  it('skips non-response messages waiting in the base mailbox', async () => {
    await addAgent('u2', makeProfile('B'));
    hub.send('someone', 'u1', { type: 'recommendation_error', reason: 'old', original_message_id: 'x' });
    hub.send('someone', 'u1', { type: 'chatter' });

    const result = await orchestrator.run('u1', 'Q');

    expect(result.helperResults.map((h) => h.agentId)).toEqual(['u2']);
    expect(hub.pending('u1')).toBe(0);
  });

  it('drains requests queued earlier for a peer and routes their replies to their senders', async () => {
    await addAgent('u2', makeProfile('B'));
    await addAgent('u9', makeProfile('Nine'), 'scout');
    hub.send('u9', 'u2', requestPayload('u9', 'earlier'));

    const result = await orchestrator.run('u1', 'Q');

    expect(result.helperResults.filter((h) => h.agentId === 'u2')).toHaveLength(1);
    expect(hub.pending('u2')).toBe(0);
    const forNine = hub.receive('u9');
    expect(forNine).toHaveLength(1);
    expect(forNine[0].payload['query']).toBe('earlier');
  });

  it('normalizes malformed response payloads during fan-in', async () => {
    hub.send('u7', 'u1', { type: 'recommendation_response', result: { products: 'lots', summary_for_user: 1 } });

    const result = await orchestrator.run('u1', 'Q');

    expect(result.helperResults).toEqual([{ agentId: 'u7', result: { products: [], summary_for_user: '' } }]);
  });

  it('carries loosely typed helper products into the merged list', async () => {
    const stove = { name: 'Stove', short_description: 'compact', why_match: null, estimated_price_range: 45 };
    hub.send('u7', 'u1', { type: 'recommendation_response', result: { products: [stove], summary_for_user: 'ok' } });

    const result = await orchestrator.run('u1', 'Q');

    const normalized = { name: 'Stove', short_description: 'compact', why_match: '', estimated_price_range: '45' };
    expect(result.helperResults).toEqual([{ agentId: 'u7', result: { products: [normalized], summary_for_user: 'ok' } }]);
    expect(result.mergedProducts).toEqual([productFor(dana, 'Q'), normalized]);
  });

  it('passes the configured cap to each worker pass', async () => {
    await addAgent('u2', makeProfile('B'));
    const spy = vi.spyOn(worker, 'process');

    await new Orchestrator({ hub, store, recommender, worker }, { workerMaxMessages: 3 }).run('u1', 'Q');

    expect(spy).toHaveBeenCalledWith('u2', 3);
  });

  it('serializes concurrent runs for the same base', async () => {
    await addAgent('u2', makeProfile('B'));

    const [a, b] = await Promise.all([orchestrator.run('u1', 'first'), orchestrator.run('u1', 'second')]);

    expect(a.helperResults).toHaveLength(1);
    expect(b.helperResults).toHaveLength(1);
    expect(a.mergedProducts.every((p) => p.name.startsWith('Dana: first'))).toBe(true);
    expect(b.mergedProducts.every((p) => p.name.startsWith('Dana: second'))).toBe(true);
  });

  it('a failed run does not block the next run for the same base', async () => {
    vi.spyOn(store, 'loadProfile').mockRejectedValueOnce(new Error('blip'));

    const failed = orchestrator.run('u1', 'Q');
    const next = orchestrator.run('u1', 'Q');

    await expect(failed).rejects.toThrow('blip');
    await expect(next).resolves.toMatchObject({ baseAgentId: 'u1' });
  });
});

describe('mergedSummary', () => {
  it('names every discovered id even when fewer answered', () => {
    expect(mergedSummary('u1', 1, ['u2', 'u3'])).toBe(
      "This response combines the base Freigent 'u1' recommendations with 1 helper Freigent(s): u2, u3.",
    );
  });
});
