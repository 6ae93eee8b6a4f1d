import { describe, expect, it } from 'vitest';
import type { SportsData, Turn } from '../types';
import {
  buildPrompt,
  HEADINGS,
  QUESTION_GUIDANCE,
  renderIntent,
  renderSportsData,
  renderValue,
  SYSTEM_INSTRUCTION,
} from './promptBuilder';

const turn = (n: number): Turn => ({ user: `pregunta ${n}`, assistant: `respuesta ${n}`, at: n });

describe('buildPrompt', () => {
  it('lays out instruction, history, sports data and query in order', () => {
    const prompt = buildPrompt({
      userText: '  ¿Cuotas?  ',
      history: [{ user: 'Hola', assistant: '¡Hola!', at: 1 }],
      sportsData: { odds: [{ home_win: 1.85, fixture_id: 1 }] },
    });

    expect(prompt).toBe(
      `${SYSTEM_INSTRUCTION}\n\n` +
        '### Conversación reciente\nUsuario: Hola\nAsistente: ¡Hola!\n\n' +
        '### Datos deportivos disponibles\nodds:\n  1. fixture_id: 1; home_win: 1.85\n\n' +
        '### Consulta del usuario\n¿Cuotas?',
    );
  });

  it('is deterministic, including for reordered but equal data', () => {
    const input = {
      userText: '¿Quién gana?',
      history: [turn(1), turn(2)],
      sportsData: { fixtures: [{ team_home: 'Barcelona', team_away: 'Real Madrid', id: 1 }] },
      context: { lastTeams: ['barcelona'] },
    };
    const reordered = {
      ...input,
      sportsData: { fixtures: [{ id: 1, team_away: 'Real Madrid', team_home: 'Barcelona' }] },
    };

    expect(buildPrompt(input)).toBe(buildPrompt(input));
    expect(buildPrompt(reordered)).toBe(buildPrompt(input));
  });

  it('omits the sports section when there is no data', () => {
    const empties: Array<SportsData | null | undefined> = [undefined, null, {}, { fixtures: [], odds: [] }];
    for (const sportsData of empties) {
      const prompt = buildPrompt({ userText: 'Hola', history: [], sportsData });
      expect(prompt).not.toContain(HEADINGS.sports);
      expect(prompt).toBe(`${SYSTEM_INSTRUCTION}\n\n### Consulta del usuario\nHola`);
    }
  });

  it('keeps only the most recent turns of the window', () => {
    const prompt = buildPrompt({ userText: 'sigue', history: [turn(1), turn(2), turn(3)], historyWindow: 2 });

    expect(prompt).not.toContain('pregunta 1');
    expect(prompt).toContain('Usuario: pregunta 2\nAsistente: respuesta 2\n\nUsuario: pregunta 3\nAsistente: respuesta 3');
  });

  it('drops history entirely with a zero window', () => {
    const prompt = buildPrompt({ userText: 'sigue', history: [turn(1)], historyWindow: 0 });

    expect(prompt).not.toContain(HEADINGS.history);
  });

  it('places the detected entities, with guidance for the question type, before the data', () => {
    const prompt = buildPrompt({
      userText: 'Analiza el clásico',
      history: [],
      intent: {
        teams: ['barcelona', 'real madrid'],
        tournaments: ['la liga'],
        betTypes: [],
        dates: ['2024-03-16'],
        questionType: 'analysis',
      },
      sportsData: { odds: [{ draw: 3.2 }] },
    });

    expect(prompt).toBe(
      `${SYSTEM_INSTRUCTION}\n\n` +
        '### Entidades identificadas\n' +
        '- Equipos: barcelona, real madrid\n' +
        '- Torneos: la liga\n' +
        '- Fechas: 2024-03-16\n' +
        '- Tipo de consulta: análisis y recomendación\n' +
        `Enfoque: ${QUESTION_GUIDANCE.analysis}\n\n` +
        '### Datos deportivos disponibles\nodds:\n  1. draw: 3.2\n\n' +
        '### Consulta del usuario\nAnaliza el clásico',
    );
  });

  it('leaves the entities section out without an intent', () => {
    expect(buildPrompt({ userText: 'Hola', history: [], intent: null })).not.toContain(HEADINGS.intent);
  });

  it('renders carry-over context', () => {
    const prompt = buildPrompt({
      userText: '¿y mañana?',
      history: [],
      context: { lastTeams: ['barcelona', 'real madrid'], lastTournament: 'la liga', preferredBetTypes: ['moneyline'] },
    });

    expect(prompt).toContain(
      '### Contexto previo\n' +
        '- Equipos mencionados: barcelona, real madrid\n' +
        '- Torneo: la liga\n' +
        '- Tipos de apuesta preferidos: moneyline',
    );
  });
});

describe('renderIntent', () => {
  it('lists only the entities found and the question type', () => {
    expect(
      renderIntent({ teams: [], tournaments: ['nba'], betTypes: ['over/under'], dates: [], questionType: 'statistics' }),
    ).toBe(
      '- Torneos: nba\n- Tipos de apuesta: over/under\n- Tipo de consulta: estadísticas\n' +
        `Enfoque: ${QUESTION_GUIDANCE.statistics}`,
    );
  });
});

describe('renderValue', () => {
  it('sorts keys and renders nested values inline', () => {
    expect(renderValue({ b: [1, null], a: { y: true, x: 's' } })).toBe('a: x: s; y: true; b: [1, -]');
  });
});

describe('renderSportsData', () => {
  it('numbers list items and skips empty entries', () => {
    expect(renderSportsData({ odds: [{ draw: 3.1 }, { draw: 2.9 }], fixtures: [], note: 'en vivo', extra: null })).toBe(
      'note: en vivo\nodds:\n  1. draw: 3.1\n  2. draw: 2.9',
    );
  });
});
