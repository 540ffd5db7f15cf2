import { describe, it, expect } from 'vitest';
import { defaultScraperConfig } from '@docket/schemas/src/scraper-config.schema.js';
import type { SearchLimits } from '@docket/schemas/src/scraper-config.schema.js';
import { createMockPageDriverFactory } from '../driver/mock-page-driver.js';
import type { MockDecisionRow, MockPortal } from '../driver/mock-page-driver.js';
import { createRetryPolicy } from '../retry/retry-policy.js';
import { createSearchSessionRunner } from './search-session.js';

const config = defaultScraperConfig();

function createRunner(portal: MockPortal = {}, limits: Partial<SearchLimits> = {}) {
  const factory = createMockPageDriverFactory(portal);
  const runner = createSearchSessionRunner(
    { driverFactory: factory, retryPolicy: createRetryPolicy({ attempts: 3, delayMs: 0 }) },
    { portal: config.portal, limits: { ...config.search, waitTimeoutMs: 50, ...limits } },
  );
  return { factory, runner };
}

function decision(serial: number, overrides: Partial<MockDecisionRow> = {}): MockDecisionRow {
  return {
    chamber: `${String(serial)}. Ceza Dairesi`,
    caseNumber: `2022/${String(serial)}`,
    decisionNumber: `2023/${String(serial)}`,
    decisionDate: '01.01.2024',
    decisionText: `Text ${String(serial)}`,
    ...overrides,
  };
}

describe('createSearchSessionRunner', () => {
  it('should stop at the target on the first page', async () => {
    const { factory, runner } = createRunner();

    const report = await runner.run('tazminat', { target: 3 });

    expect(report.state).toBe('done');
    expect(report.outcome).toEqual({ success: true, count: 3, message: '3 results found' });
    expect(report.pagesVisited).toBe(1);
    expect(report.results[0]).toEqual({
      chamber: '1. Hukuk Dairesi',
      caseNumber: '2023/101',
      decisionNumber: '2024/37',
      decisionDate: '01.01.2024',
      decisionText: 'Mock decision 1 for "tazminat".',
      matchedKeyword: 'tazminat',
    });
    expect(factory.stats.closed).toBe(1);
  });

  it('should continue on the next page until the target is reached', async () => {
    const { factory, runner } = createRunner();

    const report = await runner.run('kira', { target: 5 });

    expect(report.outcome.count).toBe(5);
    expect(report.pagesVisited).toBe(2);
    expect(report.results.map((r) => r.caseNumber)).toEqual([
      '2023/101',
      '2023/202',
      '2023/303',
      '2023/404',
      '2023/505',
    ]);
    expect(factory.stats.pagesVisited.get('kira')).toBe(2);
  });

  it('should never read past the page ceiling', async () => {
    const { factory, runner } = createRunner({}, { maxPagesToSearch: 1 });

    const report = await runner.run('kira', { target: 5 });

    expect(report.state).toBe('done');
    expect(report.outcome.count).toBe(3);
    expect(report.pagesVisited).toBe(1);
    expect(factory.stats.pagesVisited.get('kira')).toBe(1);
  });

  it('should finish when the next page control is disabled', async () => {
    const { runner } = createRunner();

    const report = await runner.run('kira', { target: 10 });

    expect(report.state).toBe('done');
    expect(report.outcome).toEqual({ success: true, count: 6, message: '6 results found' });
    expect(report.pagesVisited).toBe(2);
  });

  it('should report no results when no row appears', async () => {
    const { factory, runner } = createRunner({ pages: {} });

    const report = await runner.run('bulunmayan', { target: 3 });

    expect(report.state).toBe('noResults');
    expect(report.outcome).toEqual({ success: true, count: 0, message: 'no results' });
    expect(report.results).toEqual([]);
    expect(factory.stats.closed).toBe(1);
  });

  it('should skip a row whose detail cannot be read and keep going', async () => {
    const { runner } = createRunner({
      failOn: (event) =>
        event.operation === 'activateRow' && event.page === 1 && event.rowIndex === 1
          ? new Error('stale row')
          : undefined,
    });

    const report = await runner.run('kira', { target: 3 });

    expect(report.outcome).toEqual({ success: true, count: 3, message: '3 results found' });
    expect(report.results.map((r) => r.caseNumber)).toEqual(['2023/101', '2023/303', '2023/404']);
  });

  it('should skip rows with fewer than five cells', async () => {
    const { runner } = createRunner({
      pages: { kira: [[decision(1, { cellCount: 4 }), decision(2)]] },
    });

    const report = await runner.run('kira', { target: 3 });

    expect(report.outcome).toEqual({ success: true, count: 1, message: '1 results found' });
    expect(report.results[0]?.caseNumber).toBe('2022/2');
  });

  it('should not emit the same case twice within a session', async () => {
    const { runner } = createRunner({
      pages: { kira: [[decision(1), decision(2)], [decision(2), decision(3)]] },
    });

    const report = await runner.run('kira', { target: 5 });

    expect(report.results.map((r) => r.caseNumber)).toEqual(['2022/1', '2022/2', '2022/3']);
    expect(report.outcome.count).toBe(3);
  });

  it('should retry the initial load and then succeed', async () => {
    const { factory, runner } = createRunner({
      failOn: (event) =>
        event.operation === 'navigate' && event.navigateAttempt < 3 ? new Error('portal busy') : undefined,
    });

    const report = await runner.run('kira', { target: 1 });

    expect(report.outcome).toEqual({ success: true, count: 1, message: '1 results found' });
    expect(factory.stats.navigations).toBe(3);
  });

  it('should fail once the initial load retries are exhausted', async () => {
    const { factory, runner } = createRunner({
      failOn: (event) => (event.operation === 'navigate' ? new Error('portal down') : undefined),
    });

    const report = await runner.run('kira', { target: 3 });

    expect(report.state).toBe('failed');
    expect(report.outcome).toEqual({
      success: false,
      count: 0,
      message: 'Portal did not load after 3 attempts: portal down',
    });
    expect(factory.stats.navigations).toBe(3);
    expect(factory.stats.closed).toBe(1);
  });

  it('should keep partial results when the row snapshot fails', async () => {
    const { runner } = createRunner({
      failOn: (event) =>
        event.operation === 'findRows' && event.page === 2 ? new Error('rows gone') : undefined,
    });

    const report = await runner.run('kira', { target: 5 });

    expect(report.state).toBe('failed');
    expect(report.outcome).toEqual({
      success: false,
      count: 3,
      message: 'Could not read result rows on page 2: rows gone',
    });
    expect(report.results).toHaveLength(3);
  });

  it('should finish gracefully when the next page control cannot be located', async () => {
    const { runner } = createRunner({
      failOn: (event) => (event.operation === 'findNextPage' ? new Error('detached') : undefined),
    });

    const report = await runner.run('kira', { target: 5 });

    expect(report.state).toBe('done');
    expect(report.outcome).toEqual({ success: true, count: 3, message: '3 results found' });
  });

  it('should finish when there is no next page control', async () => {
    const { runner } = createRunner({ hideNextControl: true });

    const report = await runner.run('kira', { target: 5 });

    expect(report.state).toBe('done');
    expect(report.pagesVisited).toBe(1);
    expect(report.outcome.count).toBe(3);
  });

  it('should fail when navigating to the next page errors', async () => {
    const { runner } = createRunner({
      failOn: (event) => (event.operation === 'nextPage' ? new Error('click intercepted') : undefined),
    });

    const report = await runner.run('kira', { target: 5 });

    expect(report.state).toBe('failed');
    expect(report.outcome).toEqual({ success: false, count: 3, message: 'click intercepted' });
  });

  it('should fail without a driver when the signal is already aborted', async () => {
    const { factory, runner } = createRunner();
    const controller = new AbortController();
    controller.abort(new Error('stopped by caller'));

    const report = await runner.run('kira', { target: 3, signal: controller.signal });

    expect(report.outcome).toEqual({
      success: false,
      count: 0,
      message: 'Session aborted: stopped by caller',
    });
    expect(factory.stats.created).toBe(0);
  });

  it('should abort a pending wait and release the driver', async () => {
    const { factory, runner } = createRunner({ latencyMs: { kira: 500 } });
    const controller = new AbortController();
    setTimeout(() => {
      controller.abort(new Error('client went away'));
    }, 20);

    const report = await runner.run('kira', { target: 3, signal: controller.signal });

    expect(report.state).toBe('failed');
    expect(report.outcome.message).toBe('Session aborted: client went away');
    expect(factory.stats.closed).toBe(1);
  });

  it('should fail a session that runs past its deadline', async () => {
    const { runner } = createRunner({ latencyMs: { kira: 500 } }, { sessionTimeoutMs: 20 });

    const report = await runner.run('kira', { target: 3 });

    expect(report.state).toBe('failed');
    expect(report.outcome.message).toMatch(/^Session aborted: /);
  });

  it('should not fail the session when releasing the driver fails', async () => {
    const { factory, runner } = createRunner({
      failOn: (event) => (event.operation === 'close' ? new Error('already closed') : undefined),
    });

    const report = await runner.run('kira', { target: 2 });

    expect(report.outcome).toEqual({ success: true, count: 2, message: '2 results found' });
    expect(factory.stats.closed).toBe(1);
  });

  it('should fail when no driver can be created', async () => {
    const { runner } = createRunner({
      failOn: (event) => (event.operation === 'create' ? new Error('browser grid unavailable') : undefined),
    });

    const report = await runner.run('kira', { target: 3 });

    expect(report.outcome).toEqual({ success: false, count: 0, message: 'browser grid unavailable' });
  });
});
