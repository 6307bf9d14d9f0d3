import { describe, expect, it } from 'vitest';
import {
  distinctFacilities,
  isTypeAllowed,
  parseRowDate,
  selectMostRecentRows,
  selectRows,
} from '../src/portal/filter.js';
import type { RowRecord } from '../src/types.js';

function row(index: number, date: string, type: string, facility = ''): RowRecord {
  return { index, date, type, facility };
}

describe('parseRowDate', () => {
  it('reads the portal date formats', () => {
    const expected = new Date(2024, 4, 10).getTime();
    expect(parseRowDate('10/05/2024')?.getTime()).toBe(expected);
    expect(parseRowDate('10-05-2024')?.getTime()).toBe(expected);
    expect(parseRowDate('10.05.2024')?.getTime()).toBe(expected);
    expect(parseRowDate('2024-05-10')?.getTime()).toBe(expected);
  });

  it('ignores a trailing time', () => {
    expect(parseRowDate(' 10/05/2024 14:30 ')?.getTime()).toBe(new Date(2024, 4, 10).getTime());
  });

  it('rejects two-digit years and free text', () => {
    expect(parseRowDate('10/05/24')).toBeNull();
    expect(parseRowDate('ieri')).toBeNull();
    expect(parseRowDate('')).toBeNull();
  });
});

describe('isTypeAllowed', () => {
  const reports = new Set(['REFERTO']);

  it('accepts report subtypes when the generic category is allowed', () => {
    expect(isTypeAllowed('REFERTO SPECIALISTICO', reports)).toBe(true);
    expect(isTypeAllowed('referto di radiologia', reports)).toBe(true);
  });

  it('rejects types outside the list', () => {
    expect(isTypeAllowed('LETTERA DI DIMISSIONE', reports)).toBe(false);
    expect(isTypeAllowed('REFERTO SPECIALISTICO', new Set(['VERBALE DI PRONTO SOCCORSO']))).toBe(false);
  });

  it('accepts exact entries', () => {
    expect(isTypeAllowed('VERBALE DI PRONTO SOCCORSO', new Set(['VERBALE DI PRONTO SOCCORSO']))).toBe(true);
  });

  it('never accepts excluded types', () => {
    expect(isTypeAllowed('NON DISPONIBILE', undefined)).toBe(false);
    expect(isTypeAllowed('Prestazioni di laboratorio analisi chimiche', new Set(['PRESTAZIONI DI LABORATORIO ANALISI CHIMICHE']))).toBe(false);
  });

  it('accepts everything else without a list', () => {
    expect(isTypeAllowed('LETTERA DI DIMISSIONE', undefined)).toBe(true);
  });
});

describe('selectMostRecentRows', () => {
  it('downloads the latest visit and stops at the first older date', () => {
    const rows = [
      row(0, '10/05/2024', 'REFERTO SPECIALISTICO'),
      row(1, '10/05/2024', 'NON DISPONIBILE'),
      row(2, '09/05/2024', 'REFERTO'),
    ];
    const decisions = selectMostRecentRows(rows, new Set(['REFERTO']));

    expect(decisions).toEqual([
      { row: rows[0], action: 'download' },
      { row: rows[1], action: 'skip', reason: 'excluded' },
    ]);
  });

  it('does not resume after a differing date', () => {
    const rows = [
      row(0, '10/05/2024', 'REFERTO'),
      row(1, '09/05/2024', 'REFERTO'),
      row(2, '10/05/2024', 'REFERTO'),
    ];
    expect(selectMostRecentRows(rows).map(d => d.row.index)).toEqual([0]);
  });

  it('treats a time suffix as the same day', () => {
    const rows = [row(0, '10/05/2024 08:00', 'REFERTO'), row(1, '10/05/2024 17:45', 'REFERTO')];
    expect(selectMostRecentRows(rows)).toHaveLength(2);
  });

  it('evaluates same-date rows for type independently', () => {
    const rows = [row(0, '10/05/2024', 'LETTERA'), row(1, '10/05/2024', 'REFERTO ECOGRAFICO')];
    expect(selectMostRecentRows(rows, new Set(['REFERTO'])).map(d => d.action)).toEqual(['skip', 'download']);
  });

  it('returns nothing for an empty table', () => {
    expect(selectMostRecentRows([])).toEqual([]);
  });
});

describe('selectRows', () => {
  it('includes both date bounds', () => {
    const rows = [
      row(0, '29/02/2024', 'REFERTO'),
      row(1, '01/03/2024', 'REFERTO'),
      row(2, '15/03/2024', 'REFERTO'),
      row(3, '31/03/2024', 'REFERTO'),
      row(4, '01/04/2024', 'REFERTO'),
    ];
    const decisions = selectRows(rows, { dateFrom: new Date(2024, 2, 1), dateTo: new Date(2024, 2, 31) });
    expect(decisions.map(d => d.action)).toEqual(['skip', 'download', 'download', 'download', 'skip']);
  });

  it('compares bounds by day, not by time of day', () => {
    const decisions = selectRows([row(0, '31/03/2024', 'REFERTO')], {
      dateFrom: new Date(2024, 2, 31, 18, 30),
      dateTo: new Date(2024, 2, 31, 9, 0),
    });
    expect(decisions[0]?.action).toBe('download');
  });

  it('skips a row whose type is not allowed whatever else matches', () => {
    const decisions = selectRows([row(0, '15/03/2024', 'LETTERA DI DIMISSIONE', 'ASST Lecco')], {
      allowedTypes: new Set(['REFERTO']),
      facility: 'lecco',
      dateFrom: new Date(2024, 0, 1),
      dateTo: new Date(2024, 11, 31),
    });
    expect(decisions).toEqual([{ row: row(0, '15/03/2024', 'LETTERA DI DIMISSIONE', 'ASST Lecco'), action: 'skip', reason: 'type' }]);
  });

  it('matches the facility case-insensitively as a substring', () => {
    const rows = [row(0, '15/03/2024', 'REFERTO', 'ASST Spedali Civili'), row(1, '15/03/2024', 'REFERTO', 'ATS Brescia')];
    const decisions = selectRows(rows, { facility: '  SPEDALI ' });
    expect(decisions.map(d => (d.action === 'skip' ? d.reason : d.action))).toEqual(['download', 'facility']);
  });

  it('skips unreadable dates only when a bound is set', () => {
    const rows = [row(0, 'n.d.', 'REFERTO')];
    expect(selectRows(rows)[0]?.action).toBe('download');
    expect(selectRows(rows, { dateTo: new Date(2024, 0, 1) })[0]).toEqual({ row: rows[0], action: 'skip', reason: 'date' });
  });

  it('applies the type filter before the others', () => {
    const decisions = selectRows([row(0, 'n.d.', 'NON DISPONIBILE', 'ATS')], { facility: 'niguarda', dateFrom: new Date(2024, 0, 1) });
    expect(decisions[0]).toMatchObject({ action: 'skip', reason: 'excluded' });
  });
});

describe('distinctFacilities', () => {
  it('deduplicates, drops blanks and sorts', () => {
    const rows = [
      row(0, '', 'REFERTO', 'Ospedale Niguarda'),
      row(1, '', 'REFERTO', ' ASST Lecco '),
      row(2, '', 'REFERTO', 'Ospedale Niguarda'),
      row(3, '', 'REFERTO', ''),
    ];
    expect(distinctFacilities(rows)).toEqual(['ASST Lecco', 'Ospedale Niguarda']);
  });
});
