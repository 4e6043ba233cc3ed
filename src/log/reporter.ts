export type OutputFormat = "human" | "jsonl";

export type LogLevel = "error" | "warn" | "info";

export type LogRecord = {
  level: LogLevel;
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type Writer = (text: string) => void;

/**
 * Progress output for a run. Human mode prints plain lines; jsonl mode prints
 * one JSON object per event so the output can be collected by a scheduler.
 */
export class Reporter {
  readonly records: LogRecord[] = [];

  constructor(
    private readonly format: OutputFormat = "human",
    private readonly out: Writer = (text) => process.stdout.write(text),
    private readonly err: Writer = (text) => process.stderr.write(text),
  ) {}

  info(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "info", code, message, details });
  }

  warn(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "warn", code, message, details });
  }

  error(code: string, message: string, details?: Record<string, unknown>): void {
    this.emit({ level: "error", code, message, details });
  }

  /** One line of output from a child process, forwarded as it arrives. */
  toolOutput(line: string): void {
    if (this.format === "jsonl") {
      this.out(JSON.stringify({ level: "info", code: "TOOL_OUTPUT", message: line }) + "\n");
    } else {
      this.out(line + "\n");
    }
  }

  private emit(record: LogRecord): void {
    this.records.push(record);
    if (this.format === "jsonl") {
      const { details, ...rest } = record;
      this.out(JSON.stringify({ ...rest, ...details }) + "\n");
      return;
    }
    const write = record.level === "info" ? this.out : this.err;
    write(record.message + "\n");
  }
}
