import * as XLSX from 'xlsx';
import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { type Alerter, ALERT_SUBJECTS } from '../alerts/admin.js';
import { dueDateText } from '../deadlines/calendar.js';
import { DEFAULT_TASK_LABEL } from '../utils/config.js';
import { describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { RosterFailure, RosterResult, Student } from '../types/index.js';
import { REQUIRED_COLUMNS, resolveColumns } from './columns.js';

export type RosterFormat = 'csv' | 'xlsx';

export function resolveFormat(filePath: string): RosterFormat | null {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.xlsx') return 'xlsx';
  return null;
}

async function readWorkbook(filePath: string, format: RosterFormat): Promise<XLSX.WorkBook> {
  if (format === 'csv') {
    const text = await fsp.readFile(filePath, 'utf8');
    // raw: keep every cell as the text written in the file
    return XLSX.read(text, { type: 'string', raw: true });
  }
  const buffer = await fsp.readFile(filePath);
  // cellNF keeps each cell's number format so date serials can be recognised
  return XLSX.read(buffer, { type: 'buffer', cellNF: true });
}

/**
 * `YYYY-MM-DD` for an Excel date serial, taken from the serial's own
 * calendar fields so the local time zone never shifts the day.
 */
export function excelSerialDate(serial: number): string | null {
  const parts = XLSX.SSF.parse_date_code(serial);
  if (!parts || !parts.y) return null;
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${String(parts.y).padStart(4, '0')}-${pad(parts.m)}-${pad(parts.d)}`;
}

// Replace numeric cells carrying a date format with their calendar day as text
function convertDateSerials(sheet: XLSX.WorkSheet): void {
  const ref = sheet['!ref'];
  if (!ref) return;

  const range = XLSX.utils.decode_range(ref);
  for (let r = range.s.r; r <= range.e.r; r++) {
    for (let c = range.s.c; c <= range.e.c; c++) {
      const address = XLSX.utils.encode_cell({ r, c });
      const cell: XLSX.CellObject | undefined = sheet[address];
      if (cell?.t !== 'n' || typeof cell.v !== 'number' || cell.z === undefined) continue;
      if (!XLSX.SSF.is_date(cell.z)) continue;

      const text = excelSerialDate(cell.v);
      if (text) sheet[address] = { t: 's', v: text };
    }
  }
}

function firstSheetRows(workbook: XLSX.WorkBook): unknown[][] {
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) return [];

  convertDateSerials(sheet);
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: '',
    blankrows: true,
  });

  // Blank rows inside the data keep their id and surface as bad data; only
  // trailing ones are dropped
  let end = rows.length;
  while (end > 0 && isBlankRow(rows[end - 1])) end--;
  return rows.slice(0, end);
}

function isBlankRow(row: unknown[]): boolean {
  return row.every((cell) => String(cell ?? '').trim() === '');
}

function cellText(row: unknown[], index: number | undefined): string {
  if (index === undefined) return '';
  return String(row[index] ?? '').trim();
}

/**
 * Turn raw sheet rows (header first) into students. Pure apart from the
 * values it is given.
 */
export function buildRoster(rows: unknown[][], taskLabel: string = DEFAULT_TASK_LABEL): RosterResult {
  const [headers = [], ...records] = rows;
  const { indexes, normalized, missing } = resolveColumns(headers);

  if (missing.length > 0) {
    const found = normalized.filter((header) => header !== '');
    return {
      ok: false,
      failure: {
        category: 'missing-columns',
        message:
          `The roster must contain the columns: ${REQUIRED_COLUMNS.join(', ')}. ` +
          `Missing: ${missing.join(', ')}. Columns found: ${found.length > 0 ? found.join(', ') : '(none)'}`,
      },
    };
  }

  const students: Student[] = records.map((row, index) => ({
    id: index + 1,
    name: cellText(row, indexes.name),
    email: cellText(row, indexes.email),
    tasks: [
      {
        name: taskLabel,
        dueDate: indexes.due_date === undefined ? '' : dueDateText(row[indexes.due_date]),
        submitted: false,
      },
    ],
  }));

  return { ok: true, students };
}

function fail(category: RosterFailure['category'], message: string): RosterResult {
  return { ok: false, failure: { category, message } };
}

/**
 * Read and validate a roster file. Expected problems come back as a failure
 * value; nothing is logged or reported here.
 */
export async function readRoster(filePath: string, taskLabel: string = DEFAULT_TASK_LABEL): Promise<RosterResult> {
  const format = resolveFormat(filePath);
  if (!format) {
    return fail('invalid-format', `Unsupported roster file "${filePath}": the file must be .xlsx or .csv`);
  }

  if (!fs.existsSync(filePath)) {
    return fail('file-not-found', `Roster file not found: ${filePath}. Nothing can be processed.`);
  }

  try {
    const workbook = await readWorkbook(filePath, format);
    return buildRoster(firstSheetRows(workbook), taskLabel);
  } catch (error) {
    return fail('parse-failure', `Critical error while reading roster ${filePath}: ${describeError(error)}`);
  }
}

export class RosterLoader {
  constructor(
    private readonly alerter: Alerter,
    private readonly taskLabel: string = DEFAULT_TASK_LABEL
  ) {}

  /**
   * Load the roster for a run. Any failure is logged and reported to the
   * administrator once, and comes back as an empty list: nothing to process.
   */
  async load(filePath: string): Promise<Student[]> {
    const result = await readRoster(filePath, this.taskLabel);

    if (!result.ok) {
      logger.error(result.failure.message);
      await this.alerter.alert(ALERT_SUBJECTS[result.failure.category], result.failure.message);
      return [];
    }

    logger.info(`Loaded ${result.students.length} students from ${filePath}`);
    return result.students;
  }
}
