export type ConversionAction =
  | 'dynamic_type_overflow'
  | 'virtual_column'
  | 'clause_removed'
  | 'property_removed'
  | 'comment_extracted'
  | 'comments_dropped'
  | 'remove_replace'
  | 'recovery_reparse'
  | 'transpile_fallback'
  | 'skipped'
  | 'error';

export interface ConversionLogEntry {
  action: ConversionAction;
  details: string;
  file: string;
}

export interface StatementConversion {
  statements: string[];
  logs: ConversionLogEntry[];
  failed: boolean;
}

export type FileStatus = 'success' | 'error' | 'skipped';

export interface FileResult {
  fileName: string;
  status: FileStatus;
  message: string;
  statements: string[];
  logs: ConversionLogEntry[];
  outputFile: string | null;
}

export interface ConversionStatistics {
  files_processed: number;
  files_converted: number;
  files_skipped: number;
  files_failed: number;
  statements_converted: number;
  statements_skipped: number;
  statements_with_errors: number;
}

export interface RunSummary {
  statistics: ConversionStatistics;
  files: FileResult[];
  outputDir: string;
  cleanupScriptPath: string | null;
  manualReviewReportPath: string | null;
}

export interface RunResult {
  status: 'success' | 'error';
  message: string;
  outputDir: string | null;
  fileResults: Array<Pick<FileResult, 'fileName' | 'status' | 'message'>>;
  summaryFilePath: string | null;
  cleanupScriptPath?: string | null;
  manualReviewReportPath?: string | null;
}

export interface ConversionOptions {
  targetVersion?: string;
  // Root of the `<source>_<target>/ddl_conversion_rules` tree
  configRoot?: string;
  // Overrides the sibling `converted/<timestamp>` directory
  outputDir?: string;
  generateCleanup?: boolean;
  now?: () => Date;
}

export type Severity = 'ERROR' | 'WARNING' | 'INFO';

export type ObjectType = 'TABLE' | 'VIEW' | 'FUNCTION' | 'PROCEDURE' | 'SEQUENCE' | 'PACKAGE' | 'UNKNOWN';

export interface ManualReviewItem {
  timestamp: string;
  file_path: string;
  object_name: string;
  object_type: ObjectType;
  issue_type: string;
  severity: Severity;
  message: string;
  suggested_action: string | null;
  line_number: number | null;
  status: 'PENDING_REVIEW';
}
