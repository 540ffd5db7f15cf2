import { setTimeout as delay } from 'node:timers/promises';
import type { PortalConfig, SearchLimits } from '@docket/schemas/src/scraper-config.schema.js';
import type { DecisionRecord, SearchOutcome } from '@docket/shared/src/types/decision.types.js';
import { caseIdOf } from '@docket/shared/src/types/decision.types.js';
import { createChildLogger } from '@docket/shared/src/logger.js';
import {
  SessionAbortedError,
  SessionFatalError,
  TransientLoadError,
  toError,
} from '@docket/shared/src/utils/errors.js';
import type { PageDriver, PageDriverFactory, PageElement } from '../driver/page-driver.js';
import type { RetryPolicy } from '../retry/retry-policy.js';
import { abortedError, raceAbort, throwIfAborted, withDeadline } from './abort.js';
import { readRowSummary } from './row-extractor.js';

const log = createChildLogger('search:session');

const READY_POLL_INTERVAL_MS = 250;

type SessionPhase = 'init' | 'querySubmitted' | 'resultsLoaded' | 'rowProcessing' | 'pageAdvance';
export type TerminalState = 'done' | 'noResults' | 'failed';
export type SessionState = SessionPhase | TerminalState;

export interface SessionReport {
  readonly keyword: string;
  readonly results: readonly DecisionRecord[];
  readonly outcome: SearchOutcome;
  readonly state: TerminalState;
  readonly pagesVisited: number;
}

export interface SearchSessionDeps {
  readonly driverFactory: PageDriverFactory;
  readonly retryPolicy: RetryPolicy;
}

export interface SearchSessionConfig {
  readonly portal: PortalConfig;
  readonly limits: SearchLimits;
}

export interface RunSessionOptions {
  /** Decisions to collect before stopping. */
  readonly target: number;
  readonly signal?: AbortSignal;
}

export interface SearchSessionRunner {
  /** Runs one keyword to a terminal state. Never rejects. */
  run(keyword: string, options: RunSessionOptions): Promise<SessionReport>;
}

/** Polls `document.readyState`; false when the page is not complete in time. */
export async function waitForDocumentReady(
  driver: PageDriver,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const state = await raceAbort(driver.executeScript('return document.readyState'), signal);
    if (state === 'complete') {
      return true;
    }
    if (Date.now() >= deadline) {
      return false;
    }
    await delay(READY_POLL_INTERVAL_MS, undefined, { signal });
  }
}

function isDisabled(className: string | null, ariaDisabled: string | null): boolean {
  return (className ?? '').includes('disabled') || ariaDisabled === 'true';
}

export function createSearchSessionRunner(
  deps: SearchSessionDeps,
  config: SearchSessionConfig,
): SearchSessionRunner {
  const { selectors } = config.portal;
  const { limits } = config;

  async function loadPortal(driver: PageDriver, signal: AbortSignal): Promise<void> {
    try {
      await deps.retryPolicy.execute(async (attempt) => {
        log.debug({ url: config.portal.url, attempt }, 'Loading portal');
        await raceAbort(driver.navigate(config.portal.url), signal);
        const ready = await waitForDocumentReady(driver, limits.waitTimeoutMs, signal);
        if (!ready) {
          throw new TransientLoadError('Portal page did not finish loading');
        }
      }, signal);
    } catch (error) {
      if (signal.aborted) {
        throw abortedError(signal);
      }
      const cause = toError(error);
      throw new TransientLoadError(
        `Portal did not load after ${String(deps.retryPolicy.attempts)} attempts: ${cause.message}`,
        cause,
      );
    }
  }

  async function requireElement(
    driver: PageDriver,
    locator: string,
    label: string,
    signal: AbortSignal,
  ): Promise<PageElement> {
    const element = await raceAbort(
      driver.waitForElement(locator, { timeoutMs: limits.waitTimeoutMs, state: 'clickable' }),
      signal,
    );
    if (!element) {
      throw new SessionFatalError(`${label} did not become clickable`);
    }
    return element;
  }

  async function readDetailText(driver: PageDriver, signal: AbortSignal): Promise<string> {
    const panes = await raceAbort(driver.findAll(selectors.detailPane), signal);
    const pane = panes[0];
    return pane ? raceAbort(driver.readText(pane), signal) : '';
  }

  /** Returns the clickable next-page control, or null when paging has to stop. */
  async function findNextControl(
    driver: PageDriver,
    keyword: string,
    page: number,
    signal: AbortSignal,
  ): Promise<PageElement | null> {
    try {
      const controls = await raceAbort(driver.findAll(selectors.nextPage), signal);
      const next = controls[0];
      if (!next) {
        log.debug({ keyword, page }, 'No next page control');
        return null;
      }
      const [className, ariaDisabled] = await Promise.all([
        raceAbort(driver.getAttribute(next, 'class'), signal),
        raceAbort(driver.getAttribute(next, 'aria-disabled'), signal),
      ]);
      if (isDisabled(className, ariaDisabled)) {
        log.debug({ keyword, page }, 'Next page control is disabled');
        return null;
      }
      return next;
    } catch (error) {
      if (signal.aborted) {
        throw abortedError(signal);
      }
      log.warn({ keyword, page, error: toError(error).message }, 'Could not locate next page control');
      return null;
    }
  }

  return {
    async run(keyword: string, options: RunSessionOptions): Promise<SessionReport> {
      const signal = withDeadline(limits.sessionTimeoutMs, options.signal);
      const target = Math.max(0, options.target);
      const results: DecisionRecord[] = [];
      const processedCaseIds = new Set<string>();
      let page = 1;
      let state: SessionState = 'init';
      let driver: PageDriver | undefined;
      let failure: Error | undefined;

      log.info({ keyword, target }, 'Search session started');

      try {
        throwIfAborted(signal);
        driver = await deps.driverFactory.create();
        const activeDriver = driver;

        const processRow = async (row: PageElement, rowIndex: number): Promise<void> => {
          const summary = await readRowSummary(activeDriver, row, rowIndex, selectors);
          const caseId = caseIdOf(summary);
          if (processedCaseIds.has(caseId)) {
            log.debug({ keyword, page, caseId }, 'Case already processed, skipping');
            return;
          }

          const previousText = await readDetailText(activeDriver, signal);
          await raceAbort(activeDriver.activateRow(row), signal);
          const decisionText = await raceAbort(
            activeDriver.readUpdatedDetail(selectors.detailPane, previousText, limits.detailTimeoutMs),
            signal,
          );

          results.push({ ...summary, decisionText, matchedKeyword: keyword });
          processedCaseIds.add(caseId);
          log.debug({ keyword, page, caseId, found: results.length }, 'Decision extracted');
        };

        while (state !== 'done' && state !== 'noResults' && state !== 'failed') {
          throwIfAborted(signal);

          switch (state) {
            case 'init': {
              await loadPortal(activeDriver, signal);
              state = 'querySubmitted';
              break;
            }

            case 'querySubmitted': {
              const input = await requireElement(activeDriver, selectors.searchInput, 'Search input', signal);
              await raceAbort(activeDriver.fill(input, keyword), signal);
              const submit = await requireElement(activeDriver, selectors.submitButton, 'Search button', signal);
              await raceAbort(activeDriver.click(submit), signal);
              state = 'resultsLoaded';
              break;
            }

            case 'resultsLoaded': {
              const firstRow = await raceAbort(
                activeDriver.waitForElement(selectors.resultRows, {
                  timeoutMs: limits.resultsTimeoutMs,
                  state: 'present',
                }),
                signal,
              );
              state = firstRow ? 'rowProcessing' : 'noResults';
              break;
            }

            case 'rowProcessing': {
              let rows: readonly PageElement[];
              try {
                rows = await raceAbort(activeDriver.findAll(selectors.resultRows), signal);
              } catch (error) {
                if (error instanceof SessionAbortedError) {
                  throw error;
                }
                const cause = toError(error);
                throw new SessionFatalError(
                  `Could not read result rows on page ${String(page)}: ${cause.message}`,
                  cause,
                );
              }

              log.debug({ keyword, page, rows: rows.length }, 'Processing result rows');
              for (const [rowIndex, row] of rows.entries()) {
                if (results.length >= target) {
                  break;
                }
                throwIfAborted(signal);
                try {
                  await processRow(row, rowIndex);
                } catch (error) {
                  if (error instanceof SessionAbortedError || signal.aborted) {
                    throw error;
                  }
                  log.warn(
                    { keyword, page, rowIndex, error: toError(error).message },
                    'Skipping row after extraction failure',
                  );
                }
              }
              state = 'pageAdvance';
              break;
            }

            case 'pageAdvance': {
              if (results.length >= target || page >= limits.maxPagesToSearch) {
                state = 'done';
                break;
              }
              const next = await findNextControl(activeDriver, keyword, page, signal);
              if (!next) {
                state = 'done';
                break;
              }

              await raceAbort(activeDriver.click(next), signal);
              const container = await raceAbort(
                activeDriver.waitForElement(selectors.resultsContainer, {
                  timeoutMs: limits.waitTimeoutMs,
                  state: 'present',
                }),
                signal,
              );
              const ready = await waitForDocumentReady(activeDriver, limits.waitTimeoutMs, signal);
              if (!container || !ready) {
                log.warn({ keyword, page: page + 1 }, 'Next page did not settle in time, continuing');
              }
              page++;
              state = 'rowProcessing';
              break;
            }
          }
        }
      } catch (error) {
        failure = signal.aborted && !(error instanceof SessionAbortedError) ? abortedError(signal) : toError(error);
        log.error(
          { keyword, page, state, found: results.length, error: failure.message },
          'Search session failed',
        );
        state = 'failed';
      } finally {
        if (driver) {
          try {
            await driver.close();
          } catch (error) {
            log.warn({ keyword, error: toError(error).message }, 'Failed to release page driver');
          }
        }
      }

      const terminal: TerminalState = failure ? 'failed' : state === 'noResults' ? 'noResults' : 'done';
      const outcome: SearchOutcome = failure
        ? { success: false, count: results.length, message: failure.message }
        : terminal === 'noResults'
          ? { success: true, count: 0, message: 'no results' }
          : { success: true, count: results.length, message: `${String(results.length)} results found` };

      log.info({ keyword, state: terminal, count: results.length, pages: page }, 'Search session finished');

      return {
        keyword,
        results,
        outcome,
        state: terminal,
        pagesVisited: page,
      };
    },
  };
}
