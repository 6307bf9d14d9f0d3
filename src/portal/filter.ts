import { isValid, parse, startOfDay } from 'date-fns';
import type { FilterCriteria, RowDecision, RowRecord } from '../types.js';

/** Types never downloaded, whatever the allow-list says. */
export const EXCLUDED_TYPES: ReadonlySet<string> = new Set([
  'NON DISPONIBILE',
  'PRESTAZIONI DI LABORATORIO ANALISI CHIMICHE',
]);

/** Generic report category; the portal names its subtypes `REFERTO <something>`. */
export const REPORT_PREFIX = 'REFERTO';

// Each format is gated by a pattern so that date-fns never reads a two-digit year.
const DATE_FORMATS: Array<{ pattern: RegExp; format: string }> = [
  { pattern: /^\d{1,2}\/\d{1,2}\/\d{4}$/, format: 'd/M/yyyy' },
  { pattern: /^\d{1,2}-\d{1,2}-\d{4}$/, format: 'd-M-yyyy' },
  { pattern: /^\d{1,2}\.\d{1,2}\.\d{4}$/, format: 'd.M.yyyy' },
  { pattern: /^\d{4}-\d{2}-\d{2}$/, format: 'yyyy-MM-dd' },
];

/** Parse a cell date (a trailing time is ignored). Returns the start of that day, or null. */
export function parseRowDate(text: string): Date | null {
  const token = text.trim().split(/\s+/)[0] ?? '';
  for (const { pattern, format } of DATE_FORMATS) {
    if (!pattern.test(token)) continue;
    const date = parse(token, format, new Date(0));
    if (isValid(date)) return startOfDay(date);
  }
  return null;
}

function normalizeType(type: string): string {
  return type.trim().toUpperCase();
}

export function isExcludedType(type: string): boolean {
  return EXCLUDED_TYPES.has(normalizeType(type));
}

/**
 * Allow-list check. An `undefined` list accepts every type; a list holding the generic report
 * category also accepts every type that starts with it.
 */
export function isTypeAllowed(type: string, allowed?: ReadonlySet<string>): boolean {
  if (isExcludedType(type)) return false;
  if (!allowed) return true;
  const normalized = normalizeType(type);
  const entries = new Set([...allowed].map(normalizeType));
  if (entries.has(normalized)) return true;
  return entries.has(REPORT_PREFIX) && normalized.startsWith(REPORT_PREFIX);
}

function typeDecision(row: RowRecord, allowed?: ReadonlySet<string>): RowDecision | null {
  if (isExcludedType(row.type)) return { row, action: 'skip', reason: 'excluded' };
  if (!isTypeAllowed(row.type, allowed)) return { row, action: 'skip', reason: 'type' };
  return null;
}

/** Filter chain of the all-dates mode: type, then facility, then date range (inclusive). */
export function selectRows(rows: RowRecord[], criteria: FilterCriteria = {}): RowDecision[] {
  const facility = criteria.facility?.trim().toLowerCase();
  const from = criteria.dateFrom ? startOfDay(criteria.dateFrom) : null;
  const to = criteria.dateTo ? startOfDay(criteria.dateTo) : null;

  return rows.map((row): RowDecision => {
    const rejected = typeDecision(row, criteria.allowedTypes);
    if (rejected) return rejected;

    if (facility && !row.facility.toLowerCase().includes(facility)) {
      return { row, action: 'skip', reason: 'facility' };
    }

    if (from || to) {
      const date = parseRowDate(row.date);
      if (!date || (from && date < from) || (to && date > to)) {
        return { row, action: 'skip', reason: 'date' };
      }
    }
    return { row, action: 'download' };
  });
}

function dayKey(text: string): string {
  const date = parseRowDate(text);
  return date ? String(date.getTime()) : text.trim();
}

/**
 * Most-recent mode. Rows come newest first; the scan stops at the first row whose date differs
 * from the first row's, and rows after it get no decision at all.
 */
export function selectMostRecentRows(rows: RowRecord[], allowedTypes?: ReadonlySet<string>): RowDecision[] {
  const first = rows[0];
  if (!first) return [];
  const latest = dayKey(first.date);

  const decisions: RowDecision[] = [];
  for (const row of rows) {
    if (dayKey(row.date) !== latest) break;
    decisions.push(typeDecision(row, allowedTypes) ?? { row, action: 'download' });
  }
  return decisions;
}

/** Distinct facility names, sorted the way an Italian reader expects. */
export function distinctFacilities(rows: RowRecord[]): string[] {
  const names = new Set(rows.map(r => r.facility.trim()).filter(Boolean));
  return [...names].sort((a, b) => a.localeCompare(b, 'it'));
}
