import { Writable } from 'stream';

export type OutputFormat = 'plain' | 'json';

export interface OutputOptions {
  stream?: Writable;
  format?: OutputFormat;
}

/**
 * User-facing command output. Only the CLI's one-shot commands write to
 * stdout; the server itself never does outside of protocol frames.
 */
export class OutputService {
  private readonly stdout: Writable;
  readonly format: OutputFormat;

  constructor(options?: OutputOptions) {
    this.stdout = options?.stream ?? process.stdout;
    this.format = options?.format ?? 'plain';
  }

  get isJson(): boolean {
    return this.format === 'json';
  }

  writeLine(message: string = ''): void {
    this.stdout.write(message + '\n');
  }

  writeJson(data: unknown): void {
    this.writeLine(
      this.isJson ? JSON.stringify(data, null, 2) : this.formatPlainOutput(data)
    );
  }

  writeTable(headers: string[], rows: string[][]): void {
    if (this.isJson) {
      this.writeJson(
        rows.map((row) =>
          Object.fromEntries(headers.map((header, index) => [header, row[index] ?? '']))
        )
      );
      return;
    }

    const columnWidths = headers.map((header, i) =>
      Math.max(header.length, ...rows.map((row) => row[i]?.length ?? 0))
    );
    const separator = columnWidths.map((width) => '-'.repeat(width + 2)).join('+');
    const renderRow = (cells: string[]): string =>
      '| ' +
      columnWidths.map((width, i) => (cells[i] ?? '').padEnd(width)).join(' | ') +
      ' |';

    this.writeLine(separator);
    this.writeLine(renderRow(headers));
    this.writeLine(separator);
    for (const row of rows) {
      this.writeLine(renderRow(row));
    }
    this.writeLine(separator);
  }

  private formatPlainOutput(data: unknown): string {
    if (typeof data === 'string') {
      return data;
    }
    if (data === null || data === undefined) {
      return '';
    }
    if (Array.isArray(data)) {
      return data.map((item) => this.formatPlainOutput(item)).join('\n');
    }
    if (typeof data === 'object') {
      return Object.entries(data)
        .map(([key, value]) =>
          typeof value === 'object' && value !== null
            ? `${key}: ${JSON.stringify(value)}`
            : `${key}: ${this.formatPlainOutput(value)}`
        )
        .join('\n');
    }
    return String(data);
  }
}

export const output = new OutputService();
