import { v4 as uuidv4 } from 'uuid';
import type { HubMessage, MessagePayload } from '../types.js';

/**
 * Per-agent FIFO queues. A missing mailbox and an empty one read the same.
 *
 * Every operation is synchronous, so a send can never interleave with the
 * lazy creation of its target mailbox, and a draining receive swaps the
 * queue out in one step.
 */
export class MailboxStore {
  private readonly boxes = new Map<string, HubMessage[]>();

  ensure(agentId: string): void {
    if (!this.boxes.has(agentId)) this.boxes.set(agentId, []);
  }

  send(from: string, to: string, payload: MessagePayload): HubMessage {
    const message: HubMessage = Object.freeze({
      id: uuidv4(),
      from,
      to,
      payload: Object.freeze({ ...payload }),
      timestamp: Date.now(),
    });

    const box = this.boxes.get(to);
    if (box) box.push(message);
    else this.boxes.set(to, [message]);

    return message;
  }

  receive(agentId: string, clear = true): HubMessage[] {
    const box = this.boxes.get(agentId);
    if (!box) return [];
    if (!clear) return [...box];

    this.boxes.set(agentId, []);
    return box;
  }

  pending(agentId: string): number {
    return this.boxes.get(agentId)?.length ?? 0;
  }

  has(agentId: string): boolean {
    return this.boxes.has(agentId);
  }
}
