import { describe, it, expect, beforeEach } from 'vitest';
import { MessagingHub } from './hub.js';

describe('MessagingHub', () => {
  let hub: MessagingHub;

  beforeEach(() => {
    hub = new MessagingHub();
  });

  it('register creates an empty mailbox for the agent', () => {
    hub.register({ agentId: 'u1', agentType: 'freigent', displayName: 'Dana' });
    expect(hub.mailboxes.has('u1')).toBe(true);
    expect(hub.receive('u1')).toEqual([]);
  });

  it('re-registering keeps messages already waiting', () => {
    hub.register({ agentId: 'u1', agentType: 'freigent', displayName: 'Dana' });
    hub.send('u2', 'u1', { type: 'recommendation_request' });
    hub.register({ agentId: 'u1', agentType: 'freigent', displayName: 'Dana R.' });

    expect(hub.pending('u1')).toBe(1);
    expect(hub.getAgent('u1')?.displayName).toBe('Dana R.');
  });

  it('sending to an unregistered agent stores the message without a directory entry', () => {
    const msg = hub.send('u1', 'ghost', { type: 'hello' });
    expect(hub.getAgent('ghost')).toBeUndefined();
    expect(hub.receive('ghost')).toEqual([msg]);
  });

  it('isolated hubs share no state', () => {
    const other = new MessagingHub();
    hub.register({ agentId: 'u1', agentType: 'freigent', displayName: 'Dana' });
    hub.send('u2', 'u1', {});

    expect(other.listAgents()).toEqual([]);
    expect(other.pending('u1')).toBe(0);
  });

  it('lists agents in registration order', () => {
    hub.register({ agentId: 'b', agentType: 'freigent', displayName: 'B' });
    hub.register({ agentId: 'a', agentType: 'freigent', displayName: 'A', personalitySummary: 'calm' });

    expect(hub.listAgents()).toEqual([
      { agentId: 'b', agentType: 'freigent', displayName: 'B', personalitySummary: '' },
      { agentId: 'a', agentType: 'freigent', displayName: 'A', personalitySummary: 'calm' },
    ]);
  });
});
