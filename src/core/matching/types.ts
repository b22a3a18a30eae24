export type SourceKind = 'online' | 'offline';

export const SOURCE_KINDS: readonly SourceKind[] = ['online', 'offline'];

export type RankPolicy = 'strict' | 'prefer-early';

export const RANK_POLICIES: readonly RankPolicy[] = ['strict', 'prefer-early'];

/** Immutable, non-empty list of query terms. */
export type Query = readonly bigint[];

export interface Candidate {
  identifier: string;
  terms: readonly bigint[];
  name?: string;
  /** Catalog index of the first term, kept verbatim. */
  offset?: string;
}

export interface ScoredHit {
  identifier: string;
  terms: readonly bigint[];
  name?: string;
  offset?: string;
  score: number;
  matchLen: number;
  at: number;
  source: SourceKind;
}

export type RankedResult = readonly ScoredHit[];

export type Explanation =
  | { reason: 'value_mismatch'; mismatchIndex: number; queryValue: bigint; expectedValue: bigint }
  | { reason: 'sequence_ended'; mismatchIndex: number; queryValue: bigint; expectedValue: null };

export interface CandidateProvider {
  readonly source: SourceKind;
  lookup(query: Query): Promise<Candidate[]>;
}

export type ProviderMap = Partial<Record<SourceKind, CandidateProvider>>;

export interface SourceFailure {
  source: SourceKind;
  kind: string;
  message: string;
  /** Terms dropped from the query when the failure happened. */
  dropped: number;
}

export interface RelaxationReport {
  enabled: boolean;
  /** Shortened queries tried after the initial pass. */
  attempts: number;
  exhausted: boolean;
}

export interface ProbeOptions {
  maxHits?: number;
  rank?: RankPolicy;
  minMatchLen?: number;
  relax?: boolean;
  relaxMinTerms?: number;
  relaxMaxSteps?: number;
  explain?: boolean;
  sources?: readonly SourceKind[];
  strictProviders?: boolean;
}

export interface ProbeOutcome {
  query: Query;
  effectiveQuery: Query;
  hits: RankedResult;
  dropped: number;
  relaxation: RelaxationReport;
  explanation: Explanation | null;
  sourceErrors: SourceFailure[];
}
