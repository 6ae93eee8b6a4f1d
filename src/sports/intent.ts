import vocabularyData from '../data/vocabulary.json';
import type { QuestionType, SportsIntent } from '../types';
import { extractDates } from './dates';

/**
 * Decides whether a message asks for live sports or odds data. Returning null
 * means the sports API is not consulted for this message.
 */
export interface SportsIntentDetector {
  detect(text: string): Promise<SportsIntent | null>;
}

export type EntityKind = 'teams' | 'tournaments' | 'betTypes';

export interface Vocabulary {
  /** canonical name → aliases; the canonical name itself also matches */
  teams: Record<string, string[]>;
  tournaments: Record<string, string[]>;
  betTypes: Record<string, string[]>;
  sportsKeywords: string[];
  nonSportsKeywords: string[];
  questionPatterns: Record<Exclude<QuestionType, 'general'>, string[]>;
}

export const defaultVocabulary: Vocabulary = vocabularyData;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/** Whole-word, case-insensitive matcher for a list of phrases. */
function phraseMatcher(phrases: string[]): RegExp | null {
  const alternatives = phrases
    .map((phrase) => phrase.trim().toLowerCase())
    .filter((phrase) => phrase.length > 0)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  if (alternatives.length === 0) return null;
  return new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternatives.join('|')})(?![\\p{L}\\p{N}])`, 'u');
}

interface SynonymMatcher {
  canonical: string;
  pattern: RegExp;
}

function synonymMatchers(table: Record<string, string[]>): SynonymMatcher[] {
  const matchers: SynonymMatcher[] = [];
  for (const [canonical, aliases] of Object.entries(table)) {
    const pattern = phraseMatcher([canonical, ...aliases]);
    if (pattern) matchers.push({ canonical, pattern });
  }
  return matchers;
}

/**
 * Keyword and synonym based detector. A message counts as a sports request
 * when it names a team, tournament or bet type, or uses a sports word. An
 * unrelated topic with no sports entity in it is never one.
 */
export class KeywordIntentDetector implements SportsIntentDetector {
  private readonly teams: SynonymMatcher[];
  private readonly tournaments: SynonymMatcher[];
  private readonly betTypes: SynonymMatcher[];
  private readonly sportsWords: RegExp | null;
  private readonly offTopicWords: RegExp | null;
  private readonly questionPatterns: Array<[QuestionType, RegExp | null]>;

  constructor(
    vocabulary: Vocabulary = defaultVocabulary,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.teams = synonymMatchers(vocabulary.teams);
    this.tournaments = synonymMatchers(vocabulary.tournaments);
    this.betTypes = synonymMatchers(vocabulary.betTypes);
    this.sportsWords = phraseMatcher(vocabulary.sportsKeywords);
    this.offTopicWords = phraseMatcher(vocabulary.nonSportsKeywords);
    this.questionPatterns = [
      ['analysis', phraseMatcher(vocabulary.questionPatterns.analysis)],
      ['statistics', phraseMatcher(vocabulary.questionPatterns.statistics)],
    ];
  }

  async detect(text: string): Promise<SportsIntent | null> {
    return this.match(text);
  }

  /** Synchronous form of `detect`. */
  match(text: string): SportsIntent | null {
    const query = text.toLowerCase();
    const pick = (matchers: SynonymMatcher[]) =>
      matchers.filter((matcher) => matcher.pattern.test(query)).map((matcher) => matcher.canonical);

    const intent: SportsIntent = {
      teams: pick(this.teams),
      tournaments: pick(this.tournaments),
      betTypes: pick(this.betTypes),
      dates: extractDates(text, this.now()),
      questionType: this.classify(query),
    };

    const namesEntity = intent.teams.length > 0 || intent.tournaments.length > 0 || intent.betTypes.length > 0;
    if (!namesEntity && this.offTopicWords?.test(query)) return null;

    const usesSportsWord = this.sportsWords?.test(query) ?? false;
    if (namesEntity || usesSportsWord) return intent;

    // a bare date ("¿y mañana?") is only a follow-up, not a request by itself
    return null;
  }

  /** Map a free-form name onto its canonical vocabulary entry; unknown names come back lowercased. */
  canonical(kind: EntityKind, name: string): string {
    const lowered = name.trim().toLowerCase();
    const hit = this[kind].find((matcher) => matcher.pattern.test(lowered));
    return hit ? hit.canonical : lowered;
  }

  private classify(query: string): QuestionType {
    for (const [type, pattern] of this.questionPatterns) {
      if (pattern?.test(query)) return type;
    }
    return 'general';
  }
}
