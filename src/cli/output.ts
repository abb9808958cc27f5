import type { RiskCategory } from '../engine/types.js';

export interface OutputOptions {
  json: boolean;
  color: boolean;
}

const CATEGORY_ANSI: Record<RiskCategory, string> = {
  Low: '32', // green
  Medium: '33', // yellow
  High: '35', // magenta
  Critical: '31', // red
};

export class Output {
  constructor(private options: OutputOptions) {}

  get isJson(): boolean {
    return this.options.json;
  }

  log(message: string): void {
    if (!this.options.json) {
      console.log(message);
    }
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  error(message: string): void {
    if (this.options.json) {
      this.json({ error: message });
    } else {
      console.error(this.formatError(message));
    }
  }

  success(message: string): void {
    if (!this.options.json) {
      console.log(`✓ ${message}`);
    }
  }

  warn(message: string): void {
    if (!this.options.json) {
      console.warn(`⚠ ${message}`);
    }
  }

  category(category: RiskCategory, text: string = category): string {
    if (!this.options.color) return text;
    return `\x1b[${CATEGORY_ANSI[category]}m${text}\x1b[0m`;
  }

  table(headers: string[], rows: string[][]): string {
    if (rows.length === 0) {
      return '';
    }

    const colWidths = headers.map((header, i) => {
      const maxRowWidth = Math.max(...rows.map(row => (row[i] ?? '').length));
      return Math.max(header.length, maxRowWidth);
    });

    const pad = (cells: string[]): string =>
      cells.map((cell, i) => cell.padEnd(colWidths[i] ?? cell.length)).join('  ');

    const separator = colWidths.map(width => '-'.repeat(width)).join('  ');

    return [pad(headers), separator, ...rows.map(row => pad(headers.map((_, i) => row[i] ?? '')))].join('\n');
  }

  private formatError(message: string): string {
    if (this.options.color) {
      return `\x1b[31mError:\x1b[0m ${message}`;
    }
    return `Error: ${message}`;
  }
}

export function createOutput(options: Partial<OutputOptions> = {}): Output {
  const defaults: OutputOptions = {
    json: false,
    color: process.stdout.isTTY === true,
  };

  return new Output({ ...defaults, ...options });
}
