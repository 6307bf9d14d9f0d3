import { NavigationError, ScrapeStructureError } from '../errors.js';
import type { PortalLocator, PortalPage, RowRecord, TableSchema } from '../types.js';
import { isVisibleWithin } from './wait.js';

// ── Schema ──

/**
 * Classify header texts into column positions. Each header takes the first category it
 * matches; within a category the leftmost header wins.
 */
export function resolveTableSchema(headers: string[]): TableSchema {
  let dateIndex: number | undefined;
  let typeIndex: number | undefined;
  let facilityIndex: number | undefined;
  let actionIndex: number | undefined;

  headers.forEach((raw, i) => {
    const h = raw.trim().toUpperCase();
    if (!h) return;
    if (h.includes('VISUALIZZA')) actionIndex ??= i;
    else if (h.includes('TIPOLOGIA')) typeIndex ??= i;
    else if (/\bENTE\b/.test(h) || h.includes('STRUTTURA')) facilityIndex ??= i;
    else if (h.includes('DATA')) dateIndex ??= i;
  });

  if (typeIndex === undefined) {
    throw new ScrapeStructureError(`Document type column not found in table header [${headers.map(h => h.trim()).join(' | ')}]`);
  }
  return {
    typeIndex,
    ...(dateIndex !== undefined ? { dateIndex } : {}),
    ...(facilityIndex !== undefined ? { facilityIndex } : {}),
    ...(actionIndex !== undefined ? { actionIndex } : {}),
  };
}

function highestIndex(schema: TableSchema): number {
  return Math.max(schema.typeIndex, schema.dateIndex ?? -1, schema.facilityIndex ?? -1, schema.actionIndex ?? -1);
}

/**
 * Turn the cell texts of the data rows into records. `index` is the position among data rows,
 * which is also how the download step finds the row again. Short rows are dropped.
 */
export function buildRowRecords(cells: string[][], schema: TableSchema): { rows: RowRecord[]; malformed: number[] } {
  const needed = highestIndex(schema);
  const rows: RowRecord[] = [];
  const malformed: number[] = [];
  const at = (row: string[], index: number | undefined) => (index === undefined ? '' : (row[index] ?? '').trim());

  cells.forEach((row, index) => {
    if (row.length <= needed) {
      malformed.push(index);
      return;
    }
    rows.push({
      index,
      date: at(row, schema.dateIndex),
      type: at(row, schema.typeIndex),
      facility: at(row, schema.facilityIndex),
    });
  });
  return { rows, malformed };
}

// ── Page ──

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** The table whose header has a cell reading exactly `headerLabel` (case-insensitive). */
export function resultsTable(page: PortalPage, headerLabel: string): PortalLocator {
  const label = new RegExp(`^\\s*${escapeRegExp(headerLabel)}\\s*$`, 'i');
  return page.locator('table').filter({ has: page.locator('th', { hasText: label }) }).first();
}

/** Rows holding at least one data cell, in table order. */
export function dataRows(page: PortalPage, table: PortalLocator): PortalLocator {
  return table.locator('tbody tr').filter({ has: page.locator('td') });
}

export async function waitForResultsTable(page: PortalPage, headerLabel: string, timeoutMs: number): Promise<PortalLocator> {
  const table = resultsTable(page, headerLabel);
  if (!await isVisibleWithin(table, timeoutMs)) {
    throw new NavigationError(`Results table ("${headerLabel}" column) not visible within ${Math.round(timeoutMs / 1000)}s`);
  }
  return table;
}

export interface ScrapeResult {
  schema: TableSchema;
  rows: RowRecord[];
  malformed: number[];
}

/** Read header and data rows of the results table in one pass, before anything is clicked. */
export async function scrapeResultsTable(page: PortalPage, opts: { headerLabel: string; timeoutMs: number }): Promise<ScrapeResult> {
  const table = await waitForResultsTable(page, opts.headerLabel, opts.timeoutMs);
  const headers = await table.locator('th').allInnerTexts();
  const schema = resolveTableSchema(headers);

  const bodyRows = table.locator('tbody tr');
  const cells: string[][] = [];
  for (let i = 0, n = await bodyRows.count(); i < n; i++) {
    const texts = await bodyRows.nth(i).locator('td').allTextContents();
    if (texts.length > 0) cells.push(texts.map(text => text.replace(/\s+/g, ' ').trim()));
  }
  return { schema, ...buildRowRecords(cells, schema) };
}
