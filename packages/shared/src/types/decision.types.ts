/** One court decision read from the portal's result table and detail pane. */
export interface DecisionRecord {
  readonly chamber: string;
  readonly caseNumber: string;
  readonly decisionNumber: string;
  readonly decisionDate: string;
  readonly decisionText: string;
  readonly matchedKeyword: string;
}

export interface SearchOutcome {
  readonly success: boolean;
  readonly count: number;
  readonly message: string;
}

export interface SearchRequest {
  readonly keywords: readonly string[];
  readonly maxResults: number;
}

export interface SearchResult {
  readonly results: readonly DecisionRecord[];
  readonly success: boolean;
  readonly message: string;
  readonly searchDetails: Readonly<Record<string, SearchOutcome>>;
  /** Seconds. */
  readonly processingTime: number;
  readonly totalKeywords: number;
  readonly uniqueResults: number;
}

export function caseIdOf(record: Pick<DecisionRecord, 'caseNumber' | 'decisionNumber'>): string {
  return `${record.caseNumber}-${record.decisionNumber}`;
}
