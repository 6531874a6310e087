import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';

import { parse } from 'csv-parse/sync';
import ExcelJS from 'exceljs';

import { describeError, InputError } from '../errors.js';
import type { CompanyInput } from '../types.js';
import { logger } from '../utils/logger.js';

const COMPANY_HEADERS = ['company', 'company name', 'firma'];
const DOMAIN_HEADERS = ['domain', 'website', 'url'];

type RawRow = Record<string, string>;

function findHeader(headers: readonly string[], candidates: readonly string[]): string | undefined {
  return headers.find((header) => candidates.includes(header.trim().toLowerCase()));
}

/** Maps tabular rows onto companies; rows with a blank company cell are dropped. */
export function rowsToCompanies(headers: readonly string[], rows: readonly RawRow[]): CompanyInput[] {
  const companyHeader = findHeader(headers, COMPANY_HEADERS);
  if (!companyHeader) {
    throw new InputError(`Input has no Company column (found: ${headers.join(', ') || 'none'})`);
  }
  const domainHeader = findHeader(headers, DOMAIN_HEADERS);

  const companies: CompanyInput[] = [];
  for (const row of rows) {
    const name = (row[companyHeader] ?? '').trim();
    if (!name) continue;
    const domain = domainHeader ? (row[domainHeader] ?? '').trim() : '';
    companies.push(domain ? { name, domain } : { name });
  }
  return companies;
}

export function parseCsvCompanies(content: string): CompanyInput[] {
  let records: unknown;
  try {
    records = parse(content, {
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
      bom: true
    });
  } catch (error) {
    throw new InputError(`Unreadable CSV input: ${describeError(error)}`, { cause: error });
  }

  const rows: RawRow[] = [];
  const headers = new Set<string>();
  if (Array.isArray(records)) {
    for (const record of records) {
      if (typeof record !== 'object' || record === null) continue;
      const row: RawRow = {};
      for (const [key, value] of Object.entries(record)) {
        headers.add(key);
        row[key] = typeof value === 'string' ? value : '';
      }
      rows.push(row);
    }
  }
  if (headers.size === 0) {
    const firstLine = content.split(/\r?\n/, 1)[0] ?? '';
    firstLine.split(',').forEach((header) => headers.add(header.trim()));
  }
  return rowsToCompanies([...headers], rows);
}

async function readWorkbookCompanies(filePath: string): Promise<CompanyInput[]> {
  // eslint-disable-next-line import/no-named-as-default-member
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw new InputError(`Unreadable workbook ${filePath}: ${describeError(error)}`, { cause: error });
  }
  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new InputError(`Workbook ${filePath} has no sheets`);
  }

  const headers = new Map<number, string>();
  sheet.getRow(1).eachCell((cell, column) => {
    headers.set(column, cell.text.trim());
  });

  const rows: RawRow[] = [];
  for (let index = 2; index <= sheet.rowCount; index += 1) {
    const row = sheet.getRow(index);
    const values: RawRow = {};
    for (const [column, header] of headers) {
      values[header] = row.getCell(column).text;
    }
    rows.push(values);
  }
  return rowsToCompanies([...headers.values()], rows);
}

export async function readCompanies(filePath: string): Promise<CompanyInput[]> {
  if (!existsSync(filePath)) {
    throw new InputError(`Input file not found: ${filePath}`);
  }
  const extension = extname(filePath).toLowerCase();
  let companies: CompanyInput[];
  if (extension === '.xlsx') {
    companies = await readWorkbookCompanies(filePath);
  } else if (extension === '.csv') {
    companies = parseCsvCompanies(readFileSync(filePath, 'utf8'));
  } else {
    throw new InputError(`Unsupported input format "${extension || 'none'}" (expected .xlsx or .csv)`);
  }
  logger.info(`Loaded ${companies.length} compan${companies.length === 1 ? 'y' : 'ies'} from ${filePath}`);
  return companies;
}
