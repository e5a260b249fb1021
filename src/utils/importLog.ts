import { log as defaultLog, type Logger } from './log.js';

export type ImportIssueKind =
  | 'unresolved-name'
  | 'unmatched-slot'
  | 'malformed-section'
  | 'ambiguous-fallback'
  | 'depth-exceeded';

export interface ImportIssue {
  kind: ImportIssueKind;
  message: string;
  section?: string;
  name?: string;
  table?: string;
}

/**
 * Logging context threaded through one import. Each `nested()` call returns a
 * view one indentation level deeper that shares the same issue list, so
 * independent passes never leak indentation into each other.
 */
export class ImportLog {
  readonly issues: ImportIssue[];
  readonly depth: number;
  readonly section?: string;
  private readonly logger: Logger;

  constructor(options: { logger?: Logger; issues?: ImportIssue[]; depth?: number; section?: string } = {}) {
    this.logger = options.logger ?? defaultLog;
    this.issues = options.issues ?? [];
    this.depth = options.depth ?? 0;
    this.section = options.section;
  }

  nested(): ImportLog {
    return new ImportLog({
      logger: this.logger,
      issues: this.issues,
      depth: this.depth + 1,
      section: this.section
    });
  }

  forSection(section: string): ImportLog {
    return new ImportLog({ logger: this.logger, issues: this.issues, depth: this.depth, section });
  }

  private prefix(message: string): string {
    return `${'  '.repeat(this.depth)}${message}`;
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.logger.info(this.prefix(message), meta);
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.logger.debug(this.prefix(message), meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.logger.warn(this.prefix(message), meta);
  }

  /** Records a non-fatal failure and surfaces it as a warning. */
  issue(kind: ImportIssueKind, message: string, details: Omit<ImportIssue, 'kind' | 'message'> = {}) {
    const entry: ImportIssue = { kind, message, ...details };
    if (entry.section === undefined && this.section !== undefined) {
      entry.section = this.section;
    }
    this.issues.push(entry);
    this.warn(message, { kind, ...details });
  }
}
