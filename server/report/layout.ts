import type { AppConfig } from '../../shared/config';
import type { CandidateSource } from '../../shared/types';
import { rankSources } from '../retrieval/dedup';
import { splitWords } from '../utils/text';

export type ScoreTier = 'low' | 'medium' | 'high';

export type Rgb = readonly [number, number, number];

export const TIER_COLORS: Record<ScoreTier, Rgb> = {
  low: [46, 160, 67],
  medium: [230, 160, 20],
  high: [210, 45, 45],
};

const TIER_LABELS: Record<ScoreTier, string> = {
  low: 'Low similarity',
  medium: 'Moderate similarity',
  high: 'High similarity',
};

export type ReportOptions = AppConfig['report'];

export interface ReportInput {
  analysisId: string;
  documentName: string;
  score: number;
  sources: readonly CandidateSource[];
  text: string;
}

export interface ReportLine {
  text: string;
  suspect: boolean;
}

export interface ReportModel {
  title: string;
  documentName: string;
  generatedAt: string;
  score: number;
  tier: ScoreTier;
  bannerLabel: string;
  chart: { unique: number; matched: number };
  lines: ReportLine[];
  sources: Array<{ rank: number; title: string; url: string; displayUrl: string; score: number }>;
  footer: string;
}

const PUNCTUATION_FOLDS: Array<[RegExp, string]> = [
  [/[\u2018\u2019\u201A\u201B\u2032\u0060\u00B4]/g, "'"],
  [/[\u201C\u201D\u201E\u201F\u2033\u00AB\u00BB]/g, '"'],
  [/[\u2010-\u2015\u2212]/g, '-'],
  [/\u2026/g, '...'],
  [/[\u2022\u2023\u2043\u25AA\u25CF]/g, '*'],
  [/[\u00A0\u2000-\u200A\u202F\u205F\u3000]/g, ' '],
  [/[\u200B-\u200D\u2060\uFEFF]/g, ''],
];

/**
 * Folds typographic punctuation to ASCII, then drops every character the
 * report fonts cannot encode (anything outside printable Latin-1).
 */
export const sanitizeForPdf = (text: string): string => {
  let out = text;
  for (const [pattern, replacement] of PUNCTUATION_FOLDS) {
    out = out.replace(pattern, replacement);
  }
  return out.replace(/[^\t\n\r\x20-\x7E\xA1-\xFF]/g, '');
};

export const scoreTier = (score: number, options: Pick<ReportOptions, 'lowTierBelow' | 'highTierAbove'>): ScoreTier => {
  if (score < options.lowTierBelow) return 'low';
  if (score > options.highTierAbove) return 'high';
  return 'medium';
};

/**
 * Splits the text into `wordsPerLine`-word lines. When the score is above
 * `flagThreshold`, every line that starts on a multiple of `flagEveryWords`
 * is marked suspect. The marking is positional, not tied to actual matches.
 */
export const buildTextLines = (
  text: string,
  score: number,
  options: Pick<ReportOptions, 'wordsPerLine' | 'flagEveryWords' | 'flagThreshold'>,
): ReportLine[] => {
  const words = splitWords(text);
  const flagging = score > options.flagThreshold;
  const lines: ReportLine[] = [];
  for (let offset = 0; offset < words.length; offset += options.wordsPerLine) {
    lines.push({
      text: words.slice(offset, offset + options.wordsPerLine).join(' '),
      suspect: flagging && offset % options.flagEveryWords === 0,
    });
  }
  return lines;
};

const formatTimestamp = (date: Date): string => date.toISOString().replace('T', ' ').slice(0, 16) + ' UTC';

export const buildReportModel = (input: ReportInput, options: ReportOptions, now = new Date()): ReportModel => {
  const score = Math.min(100, Math.max(0, input.score));
  const tier = scoreTier(score, options);
  const matched = Math.round(score * 100) / 100;

  return {
    title: 'Plagiarism Analysis Report',
    documentName: sanitizeForPdf(input.documentName),
    generatedAt: formatTimestamp(now),
    score: matched,
    tier,
    bannerLabel: `${TIER_LABELS[tier]}: ${matched.toFixed(2)}%`,
    chart: { unique: Math.round((100 - matched) * 100) / 100, matched },
    lines: buildTextLines(sanitizeForPdf(input.text), score, options),
    sources: rankSources(input.sources, options.topSources).map((source, index) => ({
      rank: index + 1,
      title: sanitizeForPdf(source.title) || sanitizeForPdf(source.url),
      url: source.url,
      displayUrl: sanitizeForPdf(source.url),
      score: source.score,
    })),
    footer: `Generated automatically for analysis ${input.analysisId}. Highlighted lines are indicative only.`,
  };
};
