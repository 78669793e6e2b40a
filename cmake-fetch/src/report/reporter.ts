import type { OutputFormat } from "../types/config.js";

export type Diagnostic = {
  level: "error" | "warn" | "info" | "debug";
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type OutputStream = {
  write(chunk: string): unknown;
};

export type ReporterOptions = {
  format: OutputFormat;
  verbose: boolean;
  stdout?: OutputStream;
  stderr?: OutputStream;
};

/**
 * Diagnostic sink shared by every pipeline stage.
 *
 * human: info and warnings on stdout, errors on stderr, debug only when verbose.
 * jsonl: one JSON object per line; errors go to stderr so stdout stays parseable.
 */
export class Reporter {
  readonly format: OutputFormat;
  readonly verbose: boolean;
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;
  private readonly history: Diagnostic[] = [];

  constructor(opts: ReporterOptions) {
    this.format = opts.format;
    this.verbose = opts.verbose;
    this.stdout = opts.stdout ?? process.stdout;
    this.stderr = opts.stderr ?? process.stderr;
  }

  info(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "info", code, message, details });
  }

  warn(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "warn", code, message, details });
  }

  error(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "error", code, message, details });
  }

  debug(code: string, message: string, details?: Record<string, unknown>): void {
    if (!this.verbose) return;
    this.emit({ level: "debug", code, message, details });
  }

  /** Everything emitted so far, in order. */
  diagnostics(): Diagnostic[] {
    return [...this.history];
  }

  private emit(d: Diagnostic): void {
    const diag: Diagnostic = d.details === undefined ? { level: d.level, code: d.code, message: d.message } : d;
    this.history.push(diag);

    if (this.format === "jsonl") {
      const target = diag.level === "error" ? this.stderr : this.stdout;
      target.write(JSON.stringify(diag) + "\n");
      return;
    }

    switch (diag.level) {
      case "error":
        this.stderr.write(diag.message + "\n");
        break;
      case "warn":
        this.stdout.write(`WARNING: ${diag.message}\n`);
        break;
      default:
        this.stdout.write(diag.message + "\n");
    }
  }
}
