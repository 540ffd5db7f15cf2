import { setTimeout as delay } from 'node:timers/promises';
import { defaultScraperConfig } from '@docket/schemas/src/scraper-config.schema.js';
import type { PortalSelectors } from '@docket/schemas/src/scraper-config.schema.js';
import { createChildLogger } from '@docket/shared/src/logger.js';
import { DriverError } from '@docket/shared/src/utils/errors.js';
import type { PageDriver, PageDriverFactory, PageElement, WaitOptions } from './page-driver.js';

const log = createChildLogger('driver:mock');

export interface MockDecisionRow {
  readonly chamber: string;
  readonly caseNumber: string;
  readonly decisionNumber: string;
  readonly decisionDate: string;
  readonly decisionText: string;
  /** Renders only the first `cellCount` cells of the row. */
  readonly cellCount?: number;
}

export type MockDriverOperation =
  | 'create'
  | 'navigate'
  | 'submit'
  | 'findRows'
  | 'activateRow'
  | 'readDetail'
  | 'findNextPage'
  | 'nextPage'
  | 'close';

export interface MockDriverEvent {
  readonly operation: MockDriverOperation;
  readonly keyword: string;
  readonly page: number;
  readonly rowIndex?: number;
  /** Navigation attempts made by this driver so far, including the current one. */
  readonly navigateAttempt: number;
}

export interface MockPortal {
  /** Result pages per keyword. When omitted every keyword gets generated results. */
  readonly pages?: Readonly<Record<string, readonly (readonly MockDecisionRow[])[]>>;
  /** Delay applied when a keyword's query is submitted. */
  readonly latencyMs?: Readonly<Record<string, number>>;
  readonly hideNextControl?: boolean;
  /** Returning an error makes the operation throw it. */
  readonly failOn?: (event: MockDriverEvent) => Error | undefined;
}

export interface MockDriverStats {
  created: number;
  closed: number;
  active: number;
  maxActive: number;
  navigations: number;
  readonly submittedKeywords: string[];
  /** Highest result page reached per keyword. */
  readonly pagesVisited: Map<string, number>;
}

export interface MockPageDriverFactory extends PageDriverFactory {
  readonly stats: MockDriverStats;
}

type MockElementKind = 'input' | 'submit' | 'container' | 'row' | 'cell' | 'detail' | 'next';

class MockElement implements PageElement {
  constructor(
    readonly kind: MockElementKind,
    readonly description: string,
    readonly rowIndex = -1,
    readonly text = '',
  ) {}
}

function toMockElement(element: PageElement): MockElement {
  if (element instanceof MockElement) {
    return element;
  }
  throw new DriverError(`Element was not produced by the mock driver: ${element.description}`);
}

function generatePages(keyword: string): MockDecisionRow[][] {
  return [1, 2].map((page) =>
    [1, 2, 3].map((row) => {
      const serial = (page - 1) * 3 + row;
      return {
        chamber: `${String(serial)}. Hukuk Dairesi`,
        caseNumber: `2023/${String(serial * 101)}`,
        decisionNumber: `2024/${String(serial * 37)}`,
        decisionDate: `0${String(row)}.0${String(page)}.2024`,
        decisionText: `Mock decision ${String(serial)} for "${keyword}".`,
      };
    }),
  );
}

function rowCells(row: MockDecisionRow, rowIndex: number): string[] {
  const cells = [
    String(rowIndex + 1),
    row.chamber,
    row.caseNumber,
    row.decisionNumber,
    row.decisionDate,
  ];
  return row.cellCount === undefined ? cells : cells.slice(0, row.cellCount);
}

export function createMockPageDriverFactory(
  portal: MockPortal = {},
  selectors: PortalSelectors = defaultScraperConfig().portal.selectors,
): MockPageDriverFactory {
  log.info('Using mock page driver');

  const stats: MockDriverStats = {
    created: 0,
    closed: 0,
    active: 0,
    maxActive: 0,
    navigations: 0,
    submittedKeywords: [],
    pagesVisited: new Map(),
  };

  function pagesFor(keyword: string): readonly (readonly MockDecisionRow[])[] {
    if (!portal.pages) {
      return generatePages(keyword);
    }
    return Object.hasOwn(portal.pages, keyword) ? portal.pages[keyword] : [];
  }

  function createDriver(): PageDriver {
    let loaded = false;
    let typed = '';
    let keyword = '';
    let submitted = false;
    let page = 1;
    let navigateAttempt = 0;
    let detailText = '';
    let activatedRow = -1;

    function check(operation: MockDriverOperation, rowIndex?: number): void {
      const error = portal.failOn?.({ operation, keyword, page, rowIndex, navigateAttempt });
      if (error) {
        throw error;
      }
    }

    function currentRows(): readonly MockDecisionRow[] {
      return submitted ? (pagesFor(keyword)[page - 1] ?? []) : [];
    }

    function isLastPage(): boolean {
      return page >= pagesFor(keyword).length;
    }

    function rowAt(index: number): MockDecisionRow {
      const row = currentRows()[index];
      if (!row) {
        throw new DriverError(`Row ${String(index)} is no longer attached`);
      }
      return row;
    }

    return {
      async navigate(): Promise<void> {
        stats.navigations++;
        navigateAttempt++;
        check('navigate');
        loaded = true;
        submitted = false;
        page = 1;
        detailText = '';
      },

      waitForElement(locator: string, _options: WaitOptions): Promise<PageElement | null> {
        if (!loaded) {
          return Promise.resolve(null);
        }
        let element: MockElement | null = null;
        if (locator === selectors.searchInput) {
          element = new MockElement('input', locator);
        } else if (locator === selectors.submitButton) {
          element = new MockElement('submit', locator);
        } else if (locator === selectors.resultsContainer && submitted) {
          element = new MockElement('container', locator);
        } else if (locator === selectors.resultRows && currentRows().length > 0) {
          element = new MockElement('row', `${locator}[0]`, 0);
        } else if (locator === selectors.detailPane) {
          element = new MockElement('detail', locator);
        } else if (locator === selectors.nextPage && submitted && !portal.hideNextControl) {
          element = new MockElement('next', locator);
        }
        return Promise.resolve(element);
      },

      async findAll(locator: string, scope?: PageElement): Promise<readonly PageElement[]> {
        if (scope) {
          const parent = toMockElement(scope);
          if (parent.kind !== 'row' || locator !== selectors.rowCells) {
            return [];
          }
          return rowCells(rowAt(parent.rowIndex), parent.rowIndex).map(
            (text, index) =>
              new MockElement('cell', `${locator}[${String(index)}]`, parent.rowIndex, text),
          );
        }
        if (locator === selectors.resultRows) {
          check('findRows');
          return currentRows().map(
            (_, index) => new MockElement('row', `${locator}[${String(index)}]`, index),
          );
        }
        if (locator === selectors.nextPage) {
          check('findNextPage');
          return submitted && !portal.hideNextControl ? [new MockElement('next', locator)] : [];
        }
        if (locator === selectors.detailPane) {
          return [new MockElement('detail', locator)];
        }
        return [];
      },

      async click(element: PageElement): Promise<void> {
        const target = toMockElement(element);
        if (target.kind === 'submit') {
          const latency =
            portal.latencyMs && Object.hasOwn(portal.latencyMs, typed) ? portal.latencyMs[typed] : 0;
          if (latency > 0) {
            await delay(latency);
          }
          keyword = typed;
          check('submit');
          submitted = true;
          page = 1;
          stats.submittedKeywords.push(keyword);
          stats.pagesVisited.set(keyword, 1);
        } else if (target.kind === 'next') {
          check('nextPage');
          if (isLastPage()) {
            throw new DriverError('Next page control is disabled');
          }
          page++;
          stats.pagesVisited.set(keyword, Math.max(stats.pagesVisited.get(keyword) ?? 0, page));
        }
      },

      fill(element: PageElement, text: string): Promise<void> {
        const target = toMockElement(element);
        if (target.kind !== 'input') {
          return Promise.reject(new DriverError(`Cannot type into ${target.description}`));
        }
        typed = text;
        return Promise.resolve();
      },

      readText(element: PageElement): Promise<string> {
        const target = toMockElement(element);
        switch (target.kind) {
          case 'cell':
            return Promise.resolve(target.text);
          case 'detail':
            return Promise.resolve(detailText);
          case 'input':
            return Promise.resolve(typed);
          case 'row':
            return Promise.resolve(rowCells(rowAt(target.rowIndex), target.rowIndex).join(' '));
          default:
            return Promise.resolve('');
        }
      },

      getAttribute(element: PageElement, name: string): Promise<string | null> {
        const target = toMockElement(element);
        if (target.kind === 'next' && name === 'class') {
          return Promise.resolve(isLastPage() ? 'paginate_button next disabled' : 'paginate_button next');
        }
        return Promise.resolve(null);
      },

      executeScript(script: string): Promise<unknown> {
        if (script.includes('readyState')) {
          return Promise.resolve(loaded ? 'complete' : 'loading');
        }
        return Promise.resolve(undefined);
      },

      async activateRow(row: PageElement): Promise<void> {
        const target = toMockElement(row);
        check('activateRow', target.rowIndex);
        activatedRow = target.rowIndex;
        detailText = rowAt(target.rowIndex).decisionText;
      },

      async readUpdatedDetail(_locator: string, previousText: string): Promise<string> {
        check('readDetail', activatedRow);
        const text = detailText.trim();
        if (text.length === 0 || text === previousText.trim()) {
          throw new DriverError('Detail pane did not update');
        }
        return text;
      },

      async close(): Promise<void> {
        stats.closed++;
        stats.active--;
        check('close');
      },
    };
  }

  return {
    stats,
    create(): Promise<PageDriver> {
      const error = portal.failOn?.({ operation: 'create', keyword: '', page: 0, navigateAttempt: 0 });
      if (error) {
        return Promise.reject(error);
      }
      stats.created++;
      stats.active++;
      stats.maxActive = Math.max(stats.maxActive, stats.active);
      return Promise.resolve(createDriver());
    },
  };
}
