/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';
import { serializeError } from '../../lib/errors/CapabilityErrors.js';

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json'
}

/**
 * Symbols for terminal output
 */
const symbols = {
  success: '✓',
  error: '✗',
  info: 'ℹ',
  bullet: '•'
};

type Cell = string | number | boolean;

/**
 * Output formatter class
 */
export class OutputFormatter {
  private format: OutputFormat;

  constructor(format: OutputFormat = OutputFormat.HUMAN) {
    this.format = format;
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else {
      console.log(`${chalk.green(symbols.success)} ${message}`);
      if (data) {
        this.details(data);
      }
    }
  }

  /**
   * Outputs error message
   */
  error(message: string, error?: unknown): void {
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: error === undefined ? undefined : serializeError(error)
      });
    } else {
      console.error(`${chalk.red(symbols.error)} ${chalk.red(message)}`);
      if (error instanceof Error) {
        console.error(`  ${chalk.dim(error.message)}`);
      }
    }
  }

  /**
   * Outputs info message
   */
  info(message: string, details?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'info', message, ...details });
    } else {
      console.log(`${chalk.blue(symbols.info)} ${message}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs a table
   */
  table(headers: string[], rows: Cell[][]): void {
    if (this.format === OutputFormat.JSON) {
      const data = rows.map(row =>
        Object.fromEntries(headers.map((header, i) => [header, row[i]]))
      );
      this.json({ type: 'table', headers, data });
      return;
    }

    const widths = headers.map((h, i) => {
      const values = [h, ...rows.map(r => String(r[i] ?? ''))];
      return Math.max(...values.map(v => v.length));
    });

    const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' │ ');
    console.log(chalk.bold(headerRow));
    console.log(chalk.dim(widths.map(w => '─'.repeat(w)).join('─┼─')));

    for (const row of rows) {
      console.log(row.map((cell, i) => String(cell).padEnd(widths[i] ?? 0)).join(' │ '));
    }
  }

  /**
   * Outputs a list
   */
  list(items: string[]): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ type: 'list', items });
    } else {
      for (const item of items) {
        console.log(`  ${chalk.dim(symbols.bullet)} ${item}`);
      }
    }
  }

  /**
   * Outputs bare lines, one value each, for consumption by build scripts
   */
  lines(values: string[]): void {
    if (this.format === OutputFormat.JSON) {
      this.json(values);
    } else {
      for (const value of values) {
        console.log(value);
      }
    }
  }

  /**
   * Outputs raw JSON
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Outputs details (key-value pairs)
   */
  private details(data: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(data)) {
      const formattedKey = key.replace(/([a-z])([A-Z])/g, '$1 $2').replace(/\b\w/g, l => l.toUpperCase());
      const formattedValue = Array.isArray(value) ? value.join(' ') : String(value);
      console.log(`  ${chalk.dim(formattedKey + ':')} ${formattedValue}`);
    }
  }

  /**
   * Sets output format
   */
  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  /**
   * Gets output format
   */
  getFormat(): OutputFormat {
    return this.format;
  }
}
