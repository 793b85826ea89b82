import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RecommendationWorker } from './worker.js';
import { requestPayload } from './protocol.js';
import { MessagingHub } from '../hub/index.js';
import { MemoryProfileStore } from '../store/index.js';
import { FakeRecommender, makeProfile, productFor } from '../test-helpers.js';

describe('RecommendationWorker', () => {
  let hub: MessagingHub;
  let store: MemoryProfileStore;
  let recommender: FakeRecommender;
  let worker: RecommendationWorker;

  beforeEach(async () => {
    hub = new MessagingHub();
    store = new MemoryProfileStore();
    recommender = new FakeRecommender();
    worker = new RecommendationWorker({ hub, store, recommender });
    await store.upsertProfile('u1', makeProfile('Dana'));
  });

  it('answers a request with one response carrying the correlation id', async () => {
    const request = hub.send('u1', 'u2', requestPayload('u1', 'tent'));

    const outcomes = await worker.process('u2');

    expect(outcomes).toEqual([{ requestMessageId: request.id, status: 'ok', sentTo: 'u1' }]);
    const replies = hub.receive('u1');
    expect(replies).toHaveLength(1);
    expect(replies[0]).toMatchObject({
      from: 'u2',
      to: 'u1',
      payload: {
        type: 'recommendation_response',
        original_message_id: request.id,
        query: 'tent',
        profile_user_id: 'u1',
        result: { products: [productFor(makeProfile('Dana'), 'tent', 1)], summary_for_user: 'Summary for Dana' },
      },
    });
  });

  it('uses the requester profile named in from_user_id', async () => {
    await store.upsertProfile('u9', makeProfile('Remy'));
    hub.send('u1', 'u2', requestPayload('u9', 'mug'));

    await worker.process('u2');

    expect(recommender.calls.map((c) => c.profile.name)).toEqual(['Remy']);
    expect(hub.receive('u1')[0].payload['profile_user_id']).toBe('u9');
  });

  it('falls back to the sender id when from_user_id is absent', async () => {
    hub.send('u1', 'u2', { type: 'recommendation_request', query: 'mug' });
    await worker.process('u2');
    expect(recommender.calls.map((c) => c.profile.name)).toEqual(['Dana']);
  });

  it('treats a missing query as empty', async () => {
    hub.send('u1', 'u2', { type: 'recommendation_request', from_user_id: 'u1' });
    await worker.process('u2');
    expect(recommender.calls[0].query).toBe('');
  });

  it('replies with an error when the profile is missing', async () => {
    const request = hub.send('ghost', 'u2', requestPayload('ghost', 'tent'));

    const outcomes = await worker.process('u2');

    expect(outcomes).toEqual([
      { requestMessageId: request.id, status: 'error', error: "No profile found for user_id 'ghost'" },
    ]);
    const replies = hub.receive('ghost');
    expect(replies).toHaveLength(1);
    expect(replies[0].payload).toEqual({
      type: 'recommendation_error',
      reason: "No profile found for user_id 'ghost'",
      original_message_id: request.id,
    });
    expect(recommender.calls).toHaveLength(0);
  });

  it('replies with an error when the profile lookup throws', async () => {
    vi.spyOn(store, 'loadProfile').mockRejectedValue(new Error('disk gone'));
    hub.send('u1', 'u2', requestPayload('u1', 'tent'));

    const outcomes = await worker.process('u2');

    expect(outcomes[0].status).toBe('error');
    expect(hub.receive('u1')[0].payload['type']).toBe('recommendation_error');
  });

  it('ignores other message types without replying', async () => {
    const note = hub.send('u1', 'u2', { type: 'chit_chat' });
    const untyped = hub.send('u1', 'u2', {});

    const outcomes = await worker.process('u2');

    expect(outcomes).toEqual([
      { requestMessageId: note.id, status: 'ignored', reason: "Unsupported payload.type 'chit_chat'" },
      { requestMessageId: untyped.id, status: 'ignored', reason: "Unsupported payload.type 'undefined'" },
    ]);
    expect(hub.receive('u1')).toEqual([]);
  });

  it('examines at most maxMessages and drops the rest', async () => {
    for (let i = 0; i < 4; i++) hub.send('u1', 'u2', requestPayload('u1', `q${i}`));

    const outcomes = await worker.process('u2', 2);

    expect(outcomes).toHaveLength(2);
    expect(recommender.calls.map((c) => c.query)).toEqual(['q0', 'q1']);
    expect(hub.pending('u2')).toBe(0);
    expect(hub.receive('u1')).toHaveLength(2);
  });

  it('caps a pass at ten messages by default', async () => {
    for (let i = 0; i < 12; i++) hub.send('u1', 'u2', { type: 'noise' });
    expect(await worker.process('u2')).toHaveLength(10);
    expect(hub.pending('u2')).toBe(0);
  });

  it('processes in arrival order', async () => {
    const first = hub.send('u1', 'u2', requestPayload('u1', 'a'));
    const second = hub.send('u1', 'u2', requestPayload('u1', 'b'));

    const outcomes = await worker.process('u2');

    expect(outcomes.map((o) => o.requestMessageId)).toEqual([first.id, second.id]);
    expect(hub.receive('u1').map((m) => m.payload['original_message_id'])).toEqual([first.id, second.id]);
  });

  it('returns nothing for an empty or unknown mailbox', async () => {
    expect(await worker.process('nobody')).toEqual([]);
  });
});
