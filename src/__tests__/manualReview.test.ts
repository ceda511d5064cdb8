import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { inferObjectType, ManualReviewCollector } from '../converter/manualReview';

const now = () => new Date('2024-05-01T10:00:00.000Z');

function collector(): ManualReviewCollector {
  const review = new ManualReviewCollector('20240501_100000', now);
  review.record({ file: 'a.sql', objectName: 'orders', objectType: 'TABLE', issueType: 'UPDATE_FROM_syntax', message: 'Rewrite the join', severity: 'ERROR', lineNumber: 3 });
  review.record({ file: 'a.sql', objectName: 'sp_load_proc', issueType: 'Dynamic_SQL', message: 'Check the SQL', suggestedAction: 'Review it' });
  review.record({ file: 'b.sql', objectName: 'calc', issueType: 'Dynamic_SQL', message: 'Check the SQL' });
  return review;
}

describe('inferObjectType', () => {
  it('guesses from naming conventions', () => {
    expect(inferObjectType('calc_func')).toBe('FUNCTION');
    expect(inferObjectType('my_function_proc')).toBe('FUNCTION');
    expect(inferObjectType('SP_LOAD_PROC')).toBe('PROCEDURE');
    expect(inferObjectType('dim_customer_tbl')).toBe('TABLE');
    expect(inferObjectType('orders')).toBe('UNKNOWN');
  });
});

describe('ManualReviewCollector', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'review-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('fills defaults for optional fields', () => {
    const [, second] = collector().getItems();
    expect(second).toEqual({
      timestamp: '2024-05-01T10:00:00.000Z',
      file_path: 'a.sql',
      object_name: 'sp_load_proc',
      object_type: 'PROCEDURE',
      issue_type: 'Dynamic_SQL',
      severity: 'WARNING',
      message: 'Check the SQL',
      suggested_action: 'Review it',
      line_number: null,
      status: 'PENDING_REVIEW'
    });
  });

  it('summarizes by type, severity and file', () => {
    const report = collector().buildReport();

    expect(report.conversion_timestamp).toBe('20240501_100000');
    expect(report.total_items_requiring_review).toBe(3);
    expect(Object.entries(report.summary_by_type)).toEqual([
      ['Dynamic_SQL', 2],
      ['UPDATE_FROM_syntax', 1]
    ]);
    expect(report.summary_by_severity).toEqual({ ERROR: 1, WARNING: 2 });
    expect(Object.entries(report.summary_by_file)).toEqual([
      ['a.sql', 2],
      ['b.sql', 1]
    ]);
  });

  it('writes one report file named after the run', async () => {
    const review = collector();

    const reportPath = await review.flush(dir);

    expect(reportPath).toBe(path.join(dir, 'manual_review_required_20240501_100000.json'));
    expect(await fs.readJson(path.join(dir, 'manual_review_required_20240501_100000.json'))).toEqual(review.buildReport());
  });

  it('writes nothing when no item was recorded', async () => {
    const review = new ManualReviewCollector('20240501_100000', now);

    expect(await review.flush(dir)).toBeNull();
    expect(await fs.readdir(dir)).toEqual([]);
    expect(review.renderReport()).toBe('No items require manual review.');
  });

  it('renders a text report', () => {
    const lines = collector().renderReport().split('\n');

    expect(lines.slice(0, 3)).toEqual(['MANUAL REVIEW REQUIRED', 'Run: 20240501_100000', 'Total items: 3']);
    expect(lines).toContain('  [ERROR] a.sql:3 orders (TABLE) UPDATE_FROM_syntax: Rewrite the join');
    expect(lines).toContain('    Suggested action: Review it');
  });
});
