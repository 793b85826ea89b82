import { AgentDirectory } from './directory.js';
import { MailboxStore } from './mailbox.js';
import { createLogger } from '../log.js';
import type { AgentRecord, HubMessage, MessagePayload } from '../types.js';

const log = createLogger('hub');

export interface RegisterAgentInput {
  agentId: string;
  agentType: string;
  displayName: string;
  personalitySummary?: string;
}

/**
 * In-memory hub for agent registration and agent-to-agent messaging.
 *
 * One instance is built at startup and handed to everything that talks to
 * agents; tests build their own. Nothing here is persisted, and no call
 * fails because an agent id is unknown.
 */
export class MessagingHub {
  readonly directory: AgentDirectory;
  readonly mailboxes: MailboxStore;

  constructor(directory = new AgentDirectory(), mailboxes = new MailboxStore()) {
    this.directory = directory;
    this.mailboxes = mailboxes;
  }

  register(input: RegisterAgentInput): AgentRecord {
    const record = this.directory.register(
      input.agentId,
      input.agentType,
      input.displayName,
      input.personalitySummary ?? '',
    );
    this.mailboxes.ensure(input.agentId);
    log.debug(`registered ${input.agentId} (${input.agentType})`);
    return record;
  }

  getAgent(agentId: string): AgentRecord | undefined {
    return this.directory.get(agentId);
  }

  listAgents(): AgentRecord[] {
    return this.directory.list();
  }

  send(from: string, to: string, payload: MessagePayload): HubMessage {
    const message = this.mailboxes.send(from, to, payload);
    log.debug(`message ${message.id} ${from} → ${to} (${String(payload['type'] ?? 'untyped')})`);
    return message;
  }

  receive(agentId: string, clear = true): HubMessage[] {
    return this.mailboxes.receive(agentId, clear);
  }

  pending(agentId: string): number {
    return this.mailboxes.pending(agentId);
  }
}
