import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';

import { createArrayCsvWriter } from 'csv-writer';
import ExcelJS from 'exceljs';

import type { CompanyResult, CompanyStatus } from '../types.js';
import { logger } from '../utils/logger.js';

export type OutputFormat = 'xlsx' | 'csv' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['xlsx', 'csv', 'json'];

export const OUTPUT_HEADERS = ['Company', 'Domain', 'Status', 'Email', 'Score', 'Source URL'] as const;

export interface OutputRow {
  company: string;
  domain: string;
  status: CompanyStatus;
  email: string;
  score: number | null;
  sourceUrl: string;
}

export interface BuildRowsOptions {
  /** Emit one row without an e-mail for companies that yielded none. */
  includeWithoutEmail: boolean;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** Format named by the file extension, or `fallback`. */
export function formatFromPath(filePath: string, fallback: OutputFormat = 'xlsx'): OutputFormat {
  const extension = extname(filePath).slice(1).toLowerCase();
  return isOutputFormat(extension) ? extension : fallback;
}

/** One row per (company, e-mail); duplicate (Company, Domain, Email) rows are dropped. */
export function buildRows(results: readonly CompanyResult[], options: BuildRowsOptions): OutputRow[] {
  const rows: OutputRow[] = [];
  const seen = new Set<string>();
  const add = (row: OutputRow) => {
    const key = `${row.company}\u0000${row.domain}\u0000${row.email}`;
    if (seen.has(key)) return;
    seen.add(key);
    rows.push(row);
  };

  for (const result of results) {
    const domain = result.domain ?? '';
    if (result.emails.length === 0) {
      if (options.includeWithoutEmail) {
        add({ company: result.company, domain, status: result.status, email: '', score: null, sourceUrl: '' });
      }
      continue;
    }
    for (const email of result.emails) {
      add({
        company: result.company,
        domain,
        status: result.status,
        email: email.address,
        score: email.score,
        sourceUrl: email.sourceUrl
      });
    }
  }
  return rows;
}

function toCells(row: OutputRow): string[] {
  return [row.company, row.domain, row.status, row.email, row.score === null ? '' : row.score.toFixed(2), row.sourceUrl];
}

export class ResultStore {
  async save(rows: readonly OutputRow[], outputPath: string, format: OutputFormat = formatFromPath(outputPath)) {
    const filePath = this.ensureDirectory(outputPath);
    switch (format) {
      case 'json':
        this.saveAsJson(rows, filePath);
        break;
      case 'csv':
        await this.saveAsCsv(rows, filePath);
        break;
      case 'xlsx':
        await this.saveAsExcel(rows, filePath);
        break;
    }
    return filePath;
  }

  saveAsJson(rows: readonly OutputRow[], filePath: string) {
    writeFileSync(filePath, `${JSON.stringify(rows, null, 2)}\n`, 'utf8');
    logger.success(`Saved ${rows.length} row(s) as JSON to ${filePath}`);
  }

  async saveAsCsv(rows: readonly OutputRow[], filePath: string) {
    const csvWriter = createArrayCsvWriter({
      path: filePath,
      header: [...OUTPUT_HEADERS]
    });
    await csvWriter.writeRecords(rows.map(toCells));
    logger.success(`Saved ${rows.length} row(s) as CSV to ${filePath}`);
  }

  async saveAsExcel(rows: readonly OutputRow[], filePath: string) {
    // eslint-disable-next-line import/no-named-as-default-member
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Results');

    sheet.columns = [
      { header: 'Company', key: 'company', width: 36 },
      { header: 'Domain', key: 'domain', width: 30 },
      { header: 'Status', key: 'status', width: 16 },
      { header: 'Email', key: 'email', width: 34 },
      { header: 'Score', key: 'score', width: 8 },
      { header: 'Source URL', key: 'sourceUrl', width: 50 }
    ];
    sheet.getRow(1).font = { bold: true };

    for (const row of rows) {
      sheet.addRow({ ...row, score: row.score ?? '' });
    }

    await workbook.xlsx.writeFile(filePath);
    logger.success(`Saved ${rows.length} row(s) as Excel to ${filePath}`);
  }

  private ensureDirectory(outputPath: string): string {
    const filePath = resolve(outputPath);
    mkdirSync(dirname(filePath), { recursive: true });
    return filePath;
  }
}
