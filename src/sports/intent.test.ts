import { describe, expect, it } from 'vitest';
import { KeywordIntentDetector } from './intent';

const detector = new KeywordIntentDetector(undefined, () => new Date(2024, 2, 15, 12, 0, 0));

describe('KeywordIntentDetector', () => {
  it('ignores greetings', () => {
    expect(detector.match('Hola')).toBeNull();
  });

  it('detects an odds question for today', () => {
    expect(detector.match('¿Qué cuotas tiene el partido de hoy?')).toEqual({
      teams: [],
      tournaments: [],
      betTypes: [],
      dates: ['2024-03-15'],
      questionType: 'general',
    });
  });

  it('maps aliases to canonical team and tournament names', () => {
    expect(detector.match('Analiza el Barça contra el Real Madrid en la Champions')).toEqual({
      teams: ['barcelona', 'real madrid'],
      tournaments: ['champions league'],
      betTypes: [],
      dates: [],
      questionType: 'analysis',
    });
  });

  it('detects bet types', () => {
    const intent = detector.match('quiero una combinada con hándicap');
    expect(intent?.betTypes).toEqual(['spread', 'parlay']);
  });

  it('classifies statistics questions', () => {
    const intent = detector.match('estadísticas de la NBA');
    expect(intent?.tournaments).toEqual(['nba']);
    expect(intent?.questionType).toBe('statistics');
  });

  it('rejects unrelated topics', () => {
    expect(detector.match('¿Qué tiempo hará mañana?')).toBeNull();
  });

  it('keeps unrelated topics that name a team', () => {
    expect(detector.match('noticias del Liverpool')?.teams).toEqual(['liverpool']);
  });

  it('matches whole words only', () => {
    expect(detector.match('la firma del contrato')).toBeNull();
  });

  it('treats a bare date as a follow-up, not a request', () => {
    expect(detector.match('¿y mañana?')).toBeNull();
  });

  it('resolves the same intent asynchronously', async () => {
    expect(await detector.detect('estadísticas de la NBA')).toEqual(detector.match('estadísticas de la NBA'));
    expect(await detector.detect('Hola')).toBeNull();
  });

  it('maps free-form names onto the vocabulary', () => {
    expect(detector.canonical('teams', 'FC Barcelona')).toBe('barcelona');
    expect(detector.canonical('tournaments', 'UEFA Champions League')).toBe('champions league');
    expect(detector.canonical('betTypes', 'Hándicap')).toBe('spread');
    expect(detector.canonical('teams', '  Sevilla ')).toBe('sevilla');
  });

  it('accepts a custom vocabulary', () => {
    const custom = new KeywordIntentDetector({
      teams: { 'los leones': ['leones'] },
      tournaments: {},
      betTypes: {},
      sportsKeywords: [],
      nonSportsKeywords: [],
      questionPatterns: { analysis: [], statistics: [] },
    });

    expect(custom.match('¿juegan los Leones?')?.teams).toEqual(['los leones']);
    expect(custom.match('¿qué cuotas hay?')).toBeNull();
  });
});
