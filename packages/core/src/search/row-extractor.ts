import type { PortalSelectors } from '@docket/schemas/src/scraper-config.schema.js';
import { RowExtractionError, toError } from '@docket/shared/src/utils/errors.js';
import type { PageDriver, PageElement } from '../driver/page-driver.js';

/** Column index of each field in a result row; column 0 is the row counter. */
const CHAMBER_CELL = 1;
const CASE_NUMBER_CELL = 2;
const DECISION_NUMBER_CELL = 3;
const DECISION_DATE_CELL = 4;
const MIN_CELLS = 5;

export interface RowSummary {
  readonly chamber: string;
  readonly caseNumber: string;
  readonly decisionNumber: string;
  readonly decisionDate: string;
}

export async function readRowSummary(
  driver: PageDriver,
  row: PageElement,
  rowIndex: number,
  selectors: Pick<PortalSelectors, 'rowCells'>,
): Promise<RowSummary> {
  let texts: string[];
  try {
    const cells = await driver.findAll(selectors.rowCells, row);
    texts = await Promise.all(cells.map(async (cell) => (await driver.readText(cell)).trim()));
  } catch (error) {
    throw new RowExtractionError(`Could not read cells of row ${String(rowIndex)}`, rowIndex, toError(error));
  }

  if (texts.length < MIN_CELLS) {
    throw new RowExtractionError(
      `Row ${String(rowIndex)} has ${String(texts.length)} cells, expected at least ${String(MIN_CELLS)}`,
      rowIndex,
    );
  }

  const summary: RowSummary = {
    chamber: texts[CHAMBER_CELL] ?? '',
    caseNumber: texts[CASE_NUMBER_CELL] ?? '',
    decisionNumber: texts[DECISION_NUMBER_CELL] ?? '',
    decisionDate: texts[DECISION_DATE_CELL] ?? '',
  };

  if (summary.caseNumber.length === 0 || summary.decisionNumber.length === 0) {
    throw new RowExtractionError(`Row ${String(rowIndex)} has no case identity`, rowIndex);
  }

  return summary;
}
