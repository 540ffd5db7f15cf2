import type {
  DecisionRecord,
  SearchOutcome,
  SearchResult,
} from '@docket/shared/src/types/decision.types.js';
import { caseIdOf } from '@docket/shared/src/types/decision.types.js';
import type { DispatchReport } from './keyword-dispatcher.js';

/**
 * Keeps the first record seen for each case id. Arrival order decides which
 * keyword a shared decision is attributed to.
 */
export function dedupeByCaseId(records: readonly DecisionRecord[]): DecisionRecord[] {
  const seen = new Set<string>();
  const unique: DecisionRecord[] = [];
  for (const record of records) {
    const caseId = caseIdOf(record);
    if (!seen.has(caseId)) {
      seen.add(caseId);
      unique.push(record);
    }
  }
  return unique;
}

const NOT_SEARCHED: SearchOutcome = { success: false, count: 0, message: 'Keyword was not searched' };

function outcomeOf(report: DispatchReport, keyword: string): SearchOutcome {
  return Object.hasOwn(report.outcomes, keyword) ? report.outcomes[keyword] : NOT_SEARCHED;
}

export function aggregateResults(report: DispatchReport, keywords: readonly string[]): SearchResult {
  const results = dedupeByCaseId(report.results);

  const searchDetails: Record<string, SearchOutcome> = Object.fromEntries(
    keywords.map((keyword) => [keyword, outcomeOf(report, keyword)]),
  );

  const outcomes = Object.values(searchDetails);
  const totalKeywords = outcomes.length;

  return {
    results,
    success: outcomes.some((outcome) => outcome.success),
    message: `Processed ${String(totalKeywords)} keywords, found ${String(results.length)} unique results`,
    searchDetails,
    processingTime: report.elapsedMs / 1000,
    totalKeywords,
    uniqueResults: results.length,
  };
}
