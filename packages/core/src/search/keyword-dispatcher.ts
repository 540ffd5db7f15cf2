import pLimit from 'p-limit';
import type { SearchLimits } from '@docket/schemas/src/scraper-config.schema.js';
import type { DecisionRecord, SearchOutcome } from '@docket/shared/src/types/decision.types.js';
import { createChildLogger } from '@docket/shared/src/logger.js';
import { toError } from '@docket/shared/src/utils/errors.js';
import { withDeadline } from './abort.js';
import type { SearchSessionRunner, SessionReport } from './search-session.js';

const log = createChildLogger('search:dispatcher');

export interface DispatchOptions {
  readonly maxResults: number;
  readonly signal?: AbortSignal;
}

export interface DispatchReport {
  /** Session reports in the order the sessions finished. */
  readonly sessions: readonly SessionReport[];
  readonly outcomes: Readonly<Record<string, SearchOutcome>>;
  /** Raw, not yet deduplicated, in completion order. */
  readonly results: readonly DecisionRecord[];
  readonly completionOrder: readonly string[];
  readonly elapsedMs: number;
}

export type DispatcherConfig = Pick<
  SearchLimits,
  'maxConcurrency' | 'targetResultsPerKeyword' | 'dispatchTimeoutMs'
>;

export interface KeywordDispatcher {
  /** Runs one session per keyword on a bounded pool. Never rejects. */
  dispatch(keywords: readonly string[], options: DispatchOptions): Promise<DispatchReport>;
}

function crashedSession(keyword: string, error: Error): SessionReport {
  return {
    keyword,
    results: [],
    outcome: { success: false, count: 0, message: error.message },
    state: 'failed',
    pagesVisited: 0,
  };
}

export function createKeywordDispatcher(
  runner: SearchSessionRunner,
  config: DispatcherConfig,
): KeywordDispatcher {
  return {
    async dispatch(keywords: readonly string[], options: DispatchOptions): Promise<DispatchReport> {
      const startedAt = Date.now();
      const unique = [...new Set(keywords)];
      const concurrency = Math.max(1, Math.min(unique.length, config.maxConcurrency));
      const target = Math.min(config.targetResultsPerKeyword, options.maxResults);
      const signal = withDeadline(config.dispatchTimeoutMs, options.signal);
      const limit = pLimit(concurrency);
      const sessions: SessionReport[] = [];

      log.info({ keywords: unique.length, concurrency, target }, 'Dispatching keyword sessions');

      await Promise.all(
        unique.map((keyword) =>
          limit(async () => {
            let report: SessionReport;
            try {
              report = await runner.run(keyword, { target, signal });
            } catch (error) {
              const cause = toError(error);
              log.error({ keyword, error: cause.message }, 'Search session crashed');
              report = crashedSession(keyword, cause);
            }
            sessions.push(report);
          }),
        ),
      );

      // Keywords are user input; fromEntries defines own keys even for "__proto__".
      const outcomes: Record<string, SearchOutcome> = Object.fromEntries(
        sessions.map((session) => [session.keyword, session.outcome]),
      );
      const elapsedMs = Date.now() - startedAt;

      log.info(
        { keywords: unique.length, succeeded: sessions.filter((s) => s.outcome.success).length, elapsedMs },
        'Dispatch finished',
      );

      return {
        sessions,
        outcomes,
        results: sessions.flatMap((session) => session.results),
        completionOrder: sessions.map((session) => session.keyword),
        elapsedMs,
      };
    },
  };
}
