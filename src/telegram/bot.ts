import { Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import type { ConversationOrchestrator } from '../chat/orchestrator';
import type { TelegramConfig } from '../config';
import { createLogger, describeError } from '../logger';
import type { SessionStore } from '../session/sessionStore';
import { type IncomingText, resolveIncomingText, splitMessage, stripMarkdown, telegramSessionId } from './format';

const logger = createLogger('telegram');

export const PLACEHOLDER_REPLY = '⏳ Consultando partidos y cuotas...';
export const DENIED_REPLY = '❌ Acceso denegado. Envía /id y comparte tu ID con el administrador.';
export const API_ERROR_REPLY = '❌ Error al contactar con el asistente. Inténtalo más tarde.';

export interface TelegramDeps {
  orchestrator: Pick<ConversationOrchestrator, 'handle'>;
  sessions: Pick<SessionStore, 'reset'>;
}

export function isAllowed(config: TelegramConfig, userId: number | undefined): boolean {
  if (config.allowedUsers.length === 0) return true;
  return userId !== undefined && config.allowedUsers.includes(userId);
}

/** Build the bot; the caller launches and stops it. */
export function createTelegramBot(config: TelegramConfig, deps: TelegramDeps): Telegraf {
  const bot = new Telegraf(config.token);

  bot.use(async (ctx, next) => {
    const text = ctx.message && 'text' in ctx.message ? ctx.message.text : '';
    if (!isAllowed(config, ctx.from?.id) && !text.startsWith('/')) {
      if (ctx.chat?.type === 'private') await ctx.reply(DENIED_REPLY);
      return;
    }
    await next();
  });

  bot.command('id', async (ctx) => {
    const userId = ctx.from?.id;
    if (userId === undefined) return;
    await ctx.reply(`Tu ID de Telegram: \`${userId}\``, { parse_mode: 'Markdown' });
  });

  bot.command('start', async (ctx) => {
    if (!isAllowed(config, ctx.from?.id)) {
      await ctx.reply(DENIED_REPLY);
      return;
    }
    await deps.sessions.reset(telegramSessionId(ctx.chat.id));
    await ctx.reply(
      '👋 ¡Hola! Pregúntame por partidos, cuotas o torneos. Recuerdo el hilo de la conversación.',
    );
  });

  bot.on(message('text'), async (ctx) => {
    const reply = ctx.message.reply_to_message;
    const incoming: IncomingText = {
      text: ctx.message.text,
      chatType: ctx.chat.type,
      replyTo: reply
        ? {
            fromBot: reply.from?.is_bot ?? false,
            text: 'text' in reply ? reply.text : 'caption' in reply ? reply.caption : undefined,
          }
        : undefined,
    };

    const prompt = resolveIncomingText(incoming, ctx.botInfo.username);
    if (!prompt) return;

    const placeholder = await ctx.reply(PLACEHOLDER_REPLY);
    let answer: string;
    try {
      const result = await deps.orchestrator.handle({ message: prompt, sessionId: telegramSessionId(ctx.chat.id) });
      answer = stripMarkdown(result.response) || API_ERROR_REPLY;
    } catch (error) {
      logger.error(`chat ${ctx.chat.id}: ${describeError(error)}`, error);
      answer = API_ERROR_REPLY;
    }

    const [first = API_ERROR_REPLY, ...rest] = splitMessage(answer);
    await ctx.telegram.editMessageText(ctx.chat.id, placeholder.message_id, undefined, first);
    for (const part of rest) {
      await ctx.reply(part);
    }
  });

  bot.catch((error, ctx) => {
    logger.error(`update ${ctx.update.update_id} failed: ${describeError(error)}`, error);
  });

  return bot;
}
