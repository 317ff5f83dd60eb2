import { readFileSync } from 'fs';
import { join } from 'path';
import { parseTemplate } from '../../src/config';
import type { ColumnData, Template } from '../../src/types';

export const fixturesPath = join(__dirname, '..', 'fixtures');

export function loadTemplate(): Template {
  return parseTemplate(JSON.parse(readFileSync(join(fixturesPath, 'template.json'), 'utf-8')));
}

export function loadDataSet(): unknown[] {
  return JSON.parse(readFileSync(join(fixturesPath, 'dataset.json'), 'utf-8'));
}

/** A filled column whose every cell starts with the given prefix */
export function column(prefix: string, barCount = 4): ColumnData {
  const bars: Record<string, string> = {};
  for (let i = 1; i <= barCount; i++) {
    bars[String(i)] = `${prefix}${i}`;
  }
  return {
    fields: { instrument: `${prefix} instrument`, reviewed: 'TRUE' },
    bars,
    comments: `${prefix} comments`,
  };
}
