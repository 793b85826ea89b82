export { AgentDirectory } from './directory.js';
export { MailboxStore } from './mailbox.js';
export { MessagingHub } from './hub.js';
export type { RegisterAgentInput } from './hub.js';
