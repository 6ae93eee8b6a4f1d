import { describe, expect, it } from 'vitest';
import { resolveIncomingText, splitMessage, stripMarkdown, TELEGRAM_MESSAGE_LIMIT, telegramSessionId } from './format';

describe('stripMarkdown', () => {
  it('removes emphasis, code, headings and citation markers', () => {
    expect(stripMarkdown('**Barcelona** gana `1.85` [web:1]')).toBe('Barcelona gana 1.85');
    expect(stripMarkdown('## Cuotas\n• Empate: 3.2')).toBe('Cuotas\n• Empate: 3.2');
    expect(stripMarkdown('una apuesta _segura_ hoy')).toBe('una apuesta segura hoy');
  });

  it('leaves identifiers with underscores alone', () => {
    expect(stripMarkdown('campo team_home y team_away')).toBe('campo team_home y team_away');
  });
});

describe('resolveIncomingText', () => {
  const BOT = 'ApuestaBot';

  it('answers everything in private chats', () => {
    expect(resolveIncomingText({ text: 'Hola', chatType: 'private' }, BOT)).toBe('Hola');
  });

  it('ignores group chatter not aimed at the bot', () => {
    expect(resolveIncomingText({ text: 'Hola a todos', chatType: 'group' }, BOT)).toBeNull();
    expect(
      resolveIncomingText({ text: 'de acuerdo', chatType: 'group', replyTo: { fromBot: false, text: 'vamos?' } }, BOT),
    ).toBeNull();
  });

  it('strips the mention when the bot is named', () => {
    expect(resolveIncomingText({ text: '@ApuestaBot cuotas del Barça', chatType: 'group' }, BOT)).toBe(
      'cuotas del Barça',
    );
    expect(resolveIncomingText({ text: '@apuestabot hola', chatType: 'supergroup' }, BOT)).toBe('hola');
  });

  it('answers replies to the bot', () => {
    expect(
      resolveIncomingText({ text: '¿y el empate?', chatType: 'group', replyTo: { fromBot: true, text: 'Gana 1.85' } }, BOT),
    ).toBe('¿y el empate?');
  });

  it('answers replies to a message that mentioned the bot', () => {
    expect(
      resolveIncomingText(
        { text: 'yo también quiero saber', chatType: 'group', replyTo: { fromBot: false, text: '@ApuestaBot cuotas?' } },
        BOT,
      ),
    ).toBe('yo también quiero saber');
  });

  it('quotes the replied-to message when the bot is mentioned in a reply', () => {
    expect(
      resolveIncomingText(
        { text: '@ApuestaBot ¿qué opinas?', chatType: 'group', replyTo: { fromBot: false, text: 'El Madrid gana seguro' } },
        BOT,
      ),
    ).toBe('¿qué opinas?\n\n[Comenta este mensaje teniendo en cuenta lo anterior: "El Madrid gana seguro"]');
  });

  it('ignores a bare mention', () => {
    expect(resolveIncomingText({ text: '@ApuestaBot', chatType: 'group' }, BOT)).toBeNull();
  });
});

describe('telegramSessionId', () => {
  it('prefixes the chat id', () => {
    expect(telegramSessionId(-100123)).toBe('telegram:-100123');
  });
});

describe('splitMessage', () => {
  it('leaves short replies whole', () => {
    expect(splitMessage('  Barça 1.85  ')).toEqual(['Barça 1.85']);
    expect(splitMessage('')).toEqual([]);
  });

  it('breaks at the last line break that fits', () => {
    expect(splitMessage('aaaa bbbb\ncccc dddd', 12)).toEqual(['aaaa bbbb', 'cccc dddd']);
  });

  it('falls back to word breaks, then to a hard cut', () => {
    expect(splitMessage('uno dos tres', 8)).toEqual(['uno dos', 'tres']);
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('keeps every chunk within the Telegram limit', () => {
    const parts = splitMessage(`${'palabra '.repeat(1000)}fin`);

    expect(parts.length).toBe(2);
    expect(parts.every((part) => part.length <= TELEGRAM_MESSAGE_LIMIT)).toBe(true);
    expect(parts.join(' ')).toBe(`${'palabra '.repeat(1000)}fin`);
  });
});
