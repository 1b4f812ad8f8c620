import type { ContentBlock, ConversationRole, ConverseMessage } from "../converse/types";

/**
 * Merge consecutive same-role messages so roles strictly alternate.
 *
 * The generic protocol allows e.g. two user turns in a row; the backend
 * rejects them. Content blocks keep their original order across merges, and
 * messages without content are dropped.
 */
export function reframeMessages(messages: ConverseMessage[]): ConverseMessage[] {
  const reframed: ConverseMessage[] = [];
  let currentRole: ConversationRole | undefined;
  let currentContent: ContentBlock[] = [];

  for (const message of messages) {
    if (message.content.length === 0) continue;
    if (message.role !== currentRole) {
      if (currentRole) {
        reframed.push({ role: currentRole, content: currentContent });
      }
      currentRole = message.role;
      currentContent = [];
    }
    currentContent.push(...message.content);
  }

  if (currentRole) {
    reframed.push({ role: currentRole, content: currentContent });
  }

  return reframed;
}
