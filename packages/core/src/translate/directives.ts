import type { ChatMessage, UserMessage } from "../types";

// In-band directive tokens a user can put in their message.
export const TOOLS_DIRECTIVE = "@tools";
export const THINKING_DIRECTIVE = "@thinking";

/** The last user-role message and its position in the conversation. */
export function latestUserMessage(messages: ChatMessage[]): { index: number; message: UserMessage } | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message.role === "user") return { index: i, message };
  }
  return undefined;
}

export function userText(message: UserMessage): string {
  return message.content.flatMap((part) => (part.type === "text" ? [part.text] : [])).join("\n");
}

/** Whitespace-separated tokens that start with "@". */
export function directiveTokens(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter((token) => token.length > 1 && token.startsWith("@")));
}

/** Remove every whole-token occurrence of `token`. */
export function stripDirective(text: string, token: string): string {
  return text
    .split(/\s+/)
    .filter((word) => word !== token && word !== "")
    .join(" ");
}
