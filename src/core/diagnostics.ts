/**
 * Diagnostics
 *
 * Structured records for every recoverable condition of a run. The pipeline
 * returns them next to whatever partial results it produced.
 */

import { Logger, LogLevel } from '../utils/logger';

export type DiagnosticKind =
  | 'missing-pathname'
  | 'missing-asset'
  | 'oversized-entry'
  | 'invalid-identifier'
  | 'material-parse'
  | 'manifest-line'
  | 'manifest-parse'
  | 'mapping'
  | 'unresolved-shader'
  | 'missing-texture'
  | 'classification-fallback'
  | 'missing-material';

export type DiagnosticSeverity = 'info' | 'warning' | 'error';

export interface Diagnostic {
  readonly kind: DiagnosticKind;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  /** Offending identifier, material name or line reference */
  readonly subject: string;
}

const SEVERITY_LEVEL: Record<DiagnosticSeverity, LogLevel> = {
  info: LogLevel.DEBUG,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Collects diagnostics and mirrors each one to a logger
 */
export class DiagnosticCollector {
  private readonly entries: Diagnostic[] = [];

  constructor(private readonly logger?: Logger) {}

  add(kind: DiagnosticKind, severity: DiagnosticSeverity, message: string, subject: string): void {
    const diagnostic: Diagnostic = { kind, severity, message, subject };
    this.entries.push(diagnostic);

    switch (SEVERITY_LEVEL[severity]) {
      case LogLevel.WARN:
        this.logger?.warn(message, { kind, subject });
        break;
      case LogLevel.ERROR:
        this.logger?.error(message, { kind, subject });
        break;
      default:
        this.logger?.debug(message, { kind, subject });
    }
  }

  info(kind: DiagnosticKind, message: string, subject: string): void {
    this.add(kind, 'info', message, subject);
  }

  warning(kind: DiagnosticKind, message: string, subject: string): void {
    this.add(kind, 'warning', message, subject);
  }

  /**
   * Record a caught error; bridge errors keep their own message
   */
  fromError(kind: DiagnosticKind, error: unknown, subject: string): void {
    const message = error instanceof Error ? error.message : String(error);
    this.add(kind, 'error', message, subject);
  }

  merge(other: readonly Diagnostic[]): void {
    this.entries.push(...other);
  }

  ofKind(kind: DiagnosticKind): Diagnostic[] {
    return this.entries.filter(entry => entry.kind === kind);
  }

  toArray(): Diagnostic[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
