import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { DEFAULT_AGENT_TYPE } from '../config/index.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../log.js';

const log = createLogger('mcp');

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

function ok(value: unknown): ToolResult {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }] };
}

function fail(message: string): ToolResult {
  return { content: [{ type: 'text' as const, text: message }], isError: true };
}

export const registerAgentShape = {
  agentId: z.string().min(1).describe('Agent id (the user id of a Freigent)'),
  agentType: z.string().default(DEFAULT_AGENT_TYPE).describe('Agent type tag'),
  displayName: z.string().min(1).describe('Name shown to other agents'),
  personalitySummary: z.string().default('').describe('Short personality description'),
};

export const sendShape = {
  from: z.string().min(1).describe('Sending agent id'),
  to: z.string().min(1).describe('Receiving agent id; its mailbox is created if missing'),
  payload: z.record(z.unknown()).describe('Message payload; payload.type names the message kind'),
};

export const receiveShape = {
  agentId: z.string().min(1).describe('Agent whose mailbox to read'),
  clear: z.boolean().default(true).describe('Empty the mailbox as part of the read'),
};

export const processShape = {
  agentId: z.string().min(1).describe('Agent whose pending recommendation requests to answer'),
  maxMessages: z.number().int().min(1).optional().describe('Cap on messages examined in this pass'),
};

export const autoSearchShape = {
  userId: z.string().min(1).describe('Base user id with a stored profile'),
  query: z.string().min(1).describe('Product search query'),
};

type Args<S extends z.ZodRawShape> = z.output<z.ZodObject<S>>;

/** Tool implementations, kept apart from the server so they can be called directly. */
export function createToolHandlers(ctx: AppContext) {
  return {
    registerAgent: async (args: Args<typeof registerAgentShape>): Promise<ToolResult> =>
      ok(ctx.hub.register(args)),

    listAgents: async (): Promise<ToolResult> =>
      ok(ctx.hub.listAgents().map((a) => ({ ...a, pendingMessages: ctx.hub.pending(a.agentId) }))),

    send: async ({ from, to, payload }: Args<typeof sendShape>): Promise<ToolResult> =>
      ok(ctx.hub.send(from, to, payload)),

    receive: async ({ agentId, clear }: Args<typeof receiveShape>): Promise<ToolResult> =>
      ok(ctx.hub.receive(agentId, clear)),

    processInbox: async ({ agentId, maxMessages }: Args<typeof processShape>): Promise<ToolResult> => {
      try {
        return ok(await ctx.worker.process(agentId, maxMessages ?? ctx.workerMaxMessages));
      } catch (err) {
        log.error(`freigent_process_inbox failed for '${agentId}'`, err);
        return fail(`Processing failed: ${errorMessage(err)}`);
      }
    },

    autoSearch: async ({ userId, query }: Args<typeof autoSearchShape>): Promise<ToolResult> => {
      try {
        return ok(await ctx.freigent.autoSearch(userId, query));
      } catch (err) {
        return fail(errorMessage(err));
      }
    },
  };
}

export function registerTools(server: McpServer, ctx: AppContext): void {
  const handlers = createToolHandlers(ctx);

  server.tool(
    'freigent_register_agent',
    'Register or update an agent in the hub directory',
    registerAgentShape,
    handlers.registerAgent,
  );

  server.tool(
    'freigent_list_agents',
    'List registered agents with the number of messages waiting for each',
    {},
    handlers.listAgents,
  );

  server.tool(
    'freigent_send',
    'Send a message from one agent to another',
    sendShape,
    handlers.send,
  );

  server.tool(
    'freigent_receive',
    'Read (and by default clear) the messages addressed to an agent',
    receiveShape,
    handlers.receive,
  );

  server.tool(
    'freigent_process_inbox',
    "Answer the recommendation requests waiting in an agent's mailbox",
    processShape,
    handlers.processInbox,
  );

  server.tool(
    'freigent_auto_search',
    'Recommend products for a user, consulting every peer Freigent through the hub',
    autoSearchShape,
    handlers.autoSearch,
  );
}
