// Telegram helpers that do not touch the network.

/** Telegram shows model markdown literally; reduce it to plain text. */
export function stripMarkdown(reply: string): string {
  return reply
    .replace(/\*\*(.*?)\*\*/g, '$1')
    .replace(/__(.*?)__/g, '$1')
    .replace(/(^|\s)_(\S.*?)_(?=\s|$|[.,!?])/g, '$1$2')
    .replace(/^#{1,6}\s+/gm, '')
    .replace(/\[\w+:\d+\]/g, '')
    .replace(/`(.*?)`/g, '$1')
    .replace(/\\\[(.*?)\\\]/g, '$1')
    .replace(/\\\((.*?)\\\)/g, '$1')
    .trim();
}

export interface IncomingText {
  text: string;
  chatType: 'private' | 'group' | 'supergroup' | 'channel';
  replyTo?: {
    fromBot: boolean;
    /** text or caption of the message being replied to */
    text?: string;
  };
}

const MENTION = /@[a-zA-Z0-9_]+/g;

/**
 * Decide whether a text message is addressed to the bot and what to ask it.
 * In private chats everything is; in groups only mentions of the bot and
 * replies to it are. Returns null when the message should be ignored.
 */
export function resolveIncomingText(input: IncomingText, botUsername: string): string | null {
  const mention = botUsername ? `@${botUsername}`.toLowerCase() : '';
  const mentionsBot = mention !== '' && input.text.toLowerCase().includes(mention);

  let prompt: string | null = null;
  if (mentionsBot) {
    prompt = input.text.replace(MENTION, '').trim();
    const quoted = input.replyTo?.text?.trim();
    if (quoted && !input.replyTo?.fromBot) {
      prompt = `${prompt}\n\n[Comenta este mensaje teniendo en cuenta lo anterior: "${quoted}"]`;
    }
  } else if (input.replyTo?.fromBot) {
    prompt = input.text;
  } else if (mention && input.replyTo?.text?.toLowerCase().includes(mention)) {
    prompt = input.text;
  } else if (input.chatType === 'private') {
    prompt = input.text;
  }

  if (prompt === null || !prompt.trim()) return null;
  return prompt.trim();
}

export const TELEGRAM_MESSAGE_LIMIT = 4096;

/** Split a reply into chunks Telegram accepts, preferring line and word breaks. */
export function splitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
  const parts: string[] = [];
  let rest = text.trim();
  while (rest.length > limit) {
    const window = rest.slice(0, limit);
    let cut = window.lastIndexOf('\n');
    if (cut <= 0) cut = window.lastIndexOf(' ');
    if (cut <= 0) cut = limit;
    const part = rest.slice(0, cut).trimEnd();
    if (part) parts.push(part);
    rest = rest.slice(cut).trimStart();
  }
  if (rest) parts.push(rest);
  return parts;
}

export function telegramSessionId(chatId: number): string {
  return `telegram:${chatId}`;
}
