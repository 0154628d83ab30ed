/**
 * One JSON file per sweep point
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { ResultRecord, SweepPoint } from './types.js';

export function modelSlug(model: string): string {
  return model.replace(/\//g, '_');
}

export function resultFileName(point: SweepPoint): string {
  return `${modelSlug(point.model)}__chunk${point.chunkSize}__bs${point.batchSize}__conc${point.concurrency}.json`;
}

/**
 * `<root>/<model_slug>__<hardware>`; the aggregator reads the hardware label back from this name
 */
export function defaultResultDir(resultsRoot: string, model: string, hardware: string): string {
  return join(resultsRoot, `${modelSlug(model)}__${hardware}`);
}

export function hasResult(dir: string, point: SweepPoint): boolean {
  return existsSync(join(dir, resultFileName(point)));
}

export function writeResult(dir: string, point: SweepPoint, record: ResultRecord): string {
  mkdirSync(dir, { recursive: true });
  const filePath = join(dir, resultFileName(point));
  writeFileSync(filePath, JSON.stringify(record, null, 2));
  return filePath;
}
