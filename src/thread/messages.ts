import type { AncestorChain, Message, RoleConfiguration } from './model.js';

/**
 * Turn an ancestor chain into the conversation sent to the transport.
 *
 * A heading equal to `aiName` (exact, case-sensitive) is an assistant turn;
 * every other heading is a user turn. The preamble always comes first.
 */
export function buildMessages(chain: AncestorChain, roles: RoleConfiguration): Message[] {
  const messages: Message[] = [{ role: 'system', content: roles.promptPreamble }];
  for (const entry of chain) {
    messages.push({
      role: entry.heading === roles.aiName ? 'assistant' : 'user',
      content: entry.body,
    });
  }
  return messages;
}
