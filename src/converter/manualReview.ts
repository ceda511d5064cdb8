import fs from 'fs-extra';
import path from 'path';
import { createLogger, errorMessage } from '../lib/logger';
import type { ManualReviewItem, ObjectType, Severity } from '../types/sql';

const logger = createLogger('manual-review');

export interface ReviewRecord {
  file: string;
  objectName: string;
  issueType: string;
  message: string;
  severity?: Severity;
  suggestedAction?: string;
  lineNumber?: number;
  objectType?: ObjectType;
}

export interface ManualReviewReport {
  conversion_timestamp: string;
  total_items_requiring_review: number;
  summary_by_type: Record<string, number>;
  summary_by_severity: Record<string, number>;
  summary_by_file: Record<string, number>;
  review_items: ManualReviewItem[];
  instructions: string[];
}

const INSTRUCTIONS = [
  'Review each entry in review_items and apply its suggested_action.',
  'Resolve every ERROR item before running the converted scripts against the target database.',
  'Set status to RESOLVED once an item has been handled.'
];

/** Guesses the object type from naming conventions such as `sp_load_proc` or `dim_customer_tbl`. */
export function inferObjectType(objectName: string): ObjectType {
  const name = objectName.toLowerCase();
  if (name.includes('function') || name.includes('func')) return 'FUNCTION';
  if (name.includes('procedure') || name.includes('proc')) return 'PROCEDURE';
  if (name.includes('table') || name.includes('tbl')) return 'TABLE';
  return 'UNKNOWN';
}

function countBy(items: ManualReviewItem[], key: (item: ManualReviewItem) => string, sortByCount: boolean): Record<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(key(item), (counts.get(key(item)) ?? 0) + 1);
  }
  const entries = [...counts];
  if (sortByCount) {
    entries.sort((a, b) => b[1] - a[1]);
  }
  return Object.fromEntries(entries);
}

/**
 * Shared sink for conversions that need a human decision. Any stage may record;
 * `flush` writes at most one report file per run.
 */
export class ManualReviewCollector {
  private readonly items: ManualReviewItem[] = [];

  constructor(
    private readonly runTimestamp: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  get size(): number {
    return this.items.length;
  }

  getItems(): readonly ManualReviewItem[] {
    return this.items;
  }

  record(record: ReviewRecord): void {
    try {
      this.items.push({
        timestamp: this.now().toISOString(),
        file_path: record.file,
        object_name: record.objectName,
        object_type: record.objectType ?? inferObjectType(record.objectName),
        issue_type: record.issueType,
        severity: record.severity ?? 'WARNING',
        message: record.message,
        suggested_action: record.suggestedAction ?? null,
        line_number: record.lineNumber ?? null,
        status: 'PENDING_REVIEW'
      });
    } catch (error) {
      logger.error(`Could not record manual review item for ${record.file}: ${errorMessage(error)}`);
    }
  }

  reportFileName(): string {
    return `manual_review_required_${this.runTimestamp}.json`;
  }

  buildReport(): ManualReviewReport {
    return {
      conversion_timestamp: this.runTimestamp,
      total_items_requiring_review: this.items.length,
      summary_by_type: countBy(this.items, item => item.issue_type, true),
      summary_by_severity: countBy(this.items, item => item.severity, false),
      summary_by_file: countBy(this.items, item => item.file_path, true),
      review_items: [...this.items],
      instructions: INSTRUCTIONS
    };
  }

  /**
   * Writes the report into `outputDir` when at least one item was recorded.
   * Repeated calls rewrite the same file.
   * @returns the report path, or null when there was nothing to report
   */
  async flush(outputDir: string): Promise<string | null> {
    if (this.items.length === 0) {
      return null;
    }
    const reportPath = path.join(outputDir, this.reportFileName());
    await fs.writeJson(reportPath, this.buildReport(), { spaces: 2 });
    logger.info(`Manual review report written: ${reportPath} (${this.items.length} items)`);
    return reportPath;
  }

  renderReport(): string {
    if (this.items.length === 0) {
      return 'No items require manual review.';
    }

    const report = this.buildReport();
    const lines = [
      'MANUAL REVIEW REQUIRED',
      `Run: ${report.conversion_timestamp}`,
      `Total items: ${report.total_items_requiring_review}`,
      '',
      'By severity:',
      ...Object.entries(report.summary_by_severity).map(([severity, count]) => `  ${severity}: ${count}`),
      '',
      'By issue type:',
      ...Object.entries(report.summary_by_type).map(([issueType, count]) => `  ${issueType}: ${count}`),
      '',
      'Items:'
    ];

    for (const item of report.review_items) {
      const location = item.line_number === null ? item.file_path : `${item.file_path}:${item.line_number}`;
      lines.push(`  [${item.severity}] ${location} ${item.object_name} (${item.object_type}) ${item.issue_type}: ${item.message}`);
      if (item.suggested_action) {
        lines.push(`    Suggested action: ${item.suggested_action}`);
      }
    }
    return lines.join('\n');
  }
}
