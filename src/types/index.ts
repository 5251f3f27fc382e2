// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'debug';
  /** Default fuzzy threshold when no CLI flag is given */
  FUZZY_THRESHOLD: number;
  /** Default per-issue penalty when no CLI flag is given */
  ISSUE_PENALTY: number;
}

// CLI options after validation
export interface CliOptions {
  ref: string;
  event?: string;
  eventDir?: string;
  output?: string;
  outputDir?: string;
  summary: boolean;
  html: boolean;
  fuzzyThreshold: number;
  issuePenalty: number;
}

// Outcome of reconciling one event file
export interface EventFileReport {
  eventPath: string;
  outputPath: string;
  /** Set when an HTML report was written as well */
  htmlPath?: string;
  resultCount: number;
  skippedRows: number;
}
