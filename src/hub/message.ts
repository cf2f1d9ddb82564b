/**
 * A single conversational unit. Roles are free-form tags such as
 * "user", "assistant" or "system".
 */
export interface Message {
  readonly role: string;
  readonly content: string;
}

export function createMessage(role: string, content: string): Message {
  return Object.freeze({ role, content });
}
