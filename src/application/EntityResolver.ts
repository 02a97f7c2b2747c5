import type { CandidateResolution, ExtractedEntity } from '../domain/entities/Turn.js';
import type { ClarificationOption } from '../domain/entities/DialogueState.js';

export interface EntityResolverConfig {
  /** Minimum confidence gap between the top two candidates to auto-resolve */
  confidenceMargin: number;
  /** Number of candidates offered when asking the user to choose */
  maxCandidates: number;
  /** Attributes tried, in order, to tell candidates apart */
  distinguishingAttributes?: string[];
}

export type Resolution =
  | { kind: 'resolved'; candidate: CandidateResolution }
  | { kind: 'ambiguous'; options: ClarificationOption[] }
  | { kind: 'unresolved' };

const DEFAULT_DISTINGUISHING_ATTRIBUTES = ['region', 'country', 'admin1', 'state'];
const MARGIN_EPSILON = 1e-9;

function numericAttribute(candidate: CandidateResolution, key: string): number {
  const value = candidate.attributes[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function candidateLabel(candidate: CandidateResolution): string {
  const label = candidate.attributes.label;
  return typeof label === 'string' && label.length > 0 ? label : candidate.id;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Confidence desc, then population desc, then label and id in lexical order
 */
export function compareCandidates(a: CandidateResolution, b: CandidateResolution): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;

  const populationDelta = numericAttribute(b, 'population') - numericAttribute(a, 'population');
  if (populationDelta !== 0) return populationDelta;

  const byLabel = compareStrings(candidateLabel(a), candidateLabel(b));
  if (byLabel !== 0) return byLabel;

  return compareStrings(a.id, b.id);
}

/**
 * Disambiguates extracted entities against their candidate resolutions.
 * Pure: the result depends only on the entity and the configured margin / candidate count.
 */
export class EntityResolver {
  private readonly distinguishingAttributes: string[];

  constructor(private readonly config: EntityResolverConfig) {
    this.distinguishingAttributes =
      config.distinguishingAttributes ?? DEFAULT_DISTINGUISHING_ATTRIBUTES;
  }

  resolve(entity: ExtractedEntity): Resolution {
    const { candidates } = entity;

    if (candidates.length === 0) {
      return { kind: 'unresolved' };
    }

    if (candidates.length === 1) {
      return { kind: 'resolved', candidate: candidates[0] };
    }

    const ranked = [...candidates].sort(compareCandidates);
    const [top, runnerUp] = ranked;

    if (top.confidence - runnerUp.confidence + MARGIN_EPSILON >= this.config.confidenceMargin) {
      return { kind: 'resolved', candidate: top };
    }

    const offered = ranked.slice(0, Math.max(2, this.config.maxCandidates));
    return { kind: 'ambiguous', options: this.annotate(entity.surfaceText, offered) };
  }

  private annotate(surfaceText: string, offered: CandidateResolution[]): ClarificationOption[] {
    const key = this.distinguishingKey(offered);

    return offered.map((candidate, index) => {
      const raw = key === null ? undefined : candidate.attributes[key];
      const distinguishing = raw === undefined ? candidate.id : String(raw);
      return {
        ordinal: index + 1,
        candidate,
        label: candidateLabel(candidate),
        distinguishing,
        display: `${surfaceText}, ${distinguishing}`,
      };
    });
  }

  /**
   * First attribute present on every offered candidate whose values are not all equal
   */
  private distinguishingKey(offered: CandidateResolution[]): string | null {
    for (const key of this.distinguishingAttributes) {
      const values = offered.map((candidate) => candidate.attributes[key]);
      if (values.some((value) => value === undefined)) continue;
      if (new Set(values.map(String)).size > 1) return key;
    }
    return null;
  }
}
