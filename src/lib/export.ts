import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { ExtractionRepository } from '../repositories/base.js';
import type { CarrierRecord, FailedExtraction } from '../types/carrier.js';
import {
  FAILURE_COLUMNS,
  RESULT_COLUMNS,
  formatFailureForOutput,
  formatForOutput,
  type FailureRow,
  type ResultRow,
} from './enrichment.js';

export function toResultRows(records: CarrierRecord[]): ResultRow[] {
  return records.map(formatForOutput);
}

export function toFailureRows(failures: FailedExtraction[]): FailureRow[] {
  return failures.map(formatFailureForOutput);
}

export function renderCsv<Row extends Record<string, string | number>>(rows: Row[], columns: readonly string[]): string {
  return stringify(rows, { header: true, columns: [...columns] });
}

export function renderJson(rows: object[]): string {
  return JSON.stringify(rows, null, 2);
}

export function renderResultsCsv(records: CarrierRecord[]): string {
  return renderCsv(toResultRows(records), RESULT_COLUMNS);
}

export function renderResultsJson(records: CarrierRecord[]): string {
  return renderJson(toResultRows(records));
}

export function renderFailuresCsv(failures: FailedExtraction[]): string {
  return renderCsv(toFailureRows(failures), FAILURE_COLUMNS);
}

/** 2026-10-19T08:05:03Z -> 20261019_080503 */
export function fileStamp(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, '').replace(/-|:/g, '').replace('T', '_');
}

export interface WrittenExports {
  resultsCsv: string | null;
  resultsJson: string;
  failuresCsv: string | null;
}

/**
 * Write a job's results (CSV when any, JSON always) and its failures (CSV
 * when any) into `outputDir`.
 */
export async function writeJobExports(
  repo: ExtractionRepository,
  jobId: string,
  outputDir: string,
  now: Date = new Date()
): Promise<WrittenExports> {
  await mkdir(outputDir, { recursive: true });

  const stamp = fileStamp(now);
  const [records, failures] = await Promise.all([repo.getRecords(jobId), repo.getFailures(jobId)]);

  let resultsCsv: string | null = null;
  if (records.length > 0) {
    resultsCsv = path.join(outputDir, `extracted_carriers_${jobId}_${stamp}.csv`);
    await writeFile(resultsCsv, renderResultsCsv(records), 'utf8');
  }

  const resultsJson = path.join(outputDir, `extracted_carriers_${jobId}_${stamp}.json`);
  await writeFile(resultsJson, renderResultsJson(records), 'utf8');

  let failuresCsv: string | null = null;
  if (failures.length > 0) {
    failuresCsv = path.join(outputDir, `failed_extractions_${jobId}_${stamp}.csv`);
    await writeFile(failuresCsv, renderFailuresCsv(failures), 'utf8');
  }

  return { resultsCsv, resultsJson, failuresCsv };
}
