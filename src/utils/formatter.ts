/**
 * Response formatting utility for Markdown and JSON output
 */

import { CONFIG } from '../config.js';
import type { OutputFormat, DetailLevel } from '../types.js';

export class ResponseFormatter {
  /**
   * Format response based on output type
   */
  static format(
    data: unknown,
    format: OutputFormat = 'markdown',
    detail: DetailLevel = 'concise'
  ): string {
    let result: string;

    if (format === 'json') {
      result = JSON.stringify(data, null, 2);
    } else {
      result = this.formatMarkdown(data, detail);
    }

    // Enforce character limit
    if (result.length > CONFIG.CHARACTER_LIMIT) {
      const truncateAt = CONFIG.CHARACTER_LIMIT - 100;
      result = result.substring(0, truncateAt) + '\n\n... [Response truncated due to length. Use format="json" for complete output]';
    }

    return result;
  }

  /**
   * Format data as Markdown
   */
  private static formatMarkdown(data: unknown, detail: DetailLevel): string {
    if (Array.isArray(data)) {
      return this.formatArray(data, detail);
    } else if (isRecord(data)) {
      return this.formatObject(data);
    } else {
      return String(data);
    }
  }

  /**
   * Format array as Markdown list/table
   */
  private static formatArray(items: unknown[], detail: DetailLevel): string {
    if (items.length === 0) {
      return '*No items found*';
    }

    const records = items.filter(isRecord);
    if (records.length === items.length) {
      return this.formatTable(records, detail);
    }

    return items.map(item => `- ${String(item)}`).join('\n');
  }

  private static formatObject(obj: Record<string, unknown>): string {
    const lines: string[] = [];

    for (const [key, value] of Object.entries(obj)) {
      lines.push(`**${this.titleCase(key)}**: ${this.formatValue(value)}`);
    }

    return lines.join('\n');
  }

  /**
   * Format array of objects as Markdown table
   */
  private static formatTable(items: Record<string, unknown>[], detail: DetailLevel): string {
    const allKeys = new Set<string>();
    items.forEach(item => {
      Object.keys(item).forEach(key => allKeys.add(key));
    });

    let keys = Array.from(allKeys);
    if (detail === 'concise') {
      const priorityKeys = ['role', 'path', 'exists', 'sizehuman'];
      keys = keys.filter(k => priorityKeys.includes(k.toLowerCase()));
    }

    if (keys.length === 0) {
      keys = Object.keys(items[0]).slice(0, 5);
    }

    const header = `| ${keys.map(k => this.titleCase(k)).join(' | ')} |`;
    const separator = `| ${keys.map(() => '---').join(' | ')} |`;

    const rows = items.map(item => {
      const values = keys.map(key => this.formatValue(item[key], 120));
      return `| ${values.join(' | ')} |`;
    });

    return [header, separator, ...rows].join('\n');
  }

  /**
   * Format a single value for display
   */
  private static formatValue(value: unknown, maxLength = Number.POSITIVE_INFINITY): string {
    if (value === null || value === undefined) {
      return '-';
    }

    if (typeof value === 'boolean') {
      return value ? '✓' : '✗';
    }

    let str = typeof value === 'object' ? JSON.stringify(value) : String(value);

    if (str.length > maxLength) {
      str = str.substring(0, maxLength - 3) + '...';
    }

    return str;
  }

  /**
   * Convert camelCase or snake_case key to title case
   */
  private static titleCase(str: string): string {
    return str
      .replace(/([A-Z])/g, ' $1')
      .replace(/^./, s => s.toUpperCase())
      .replace(/_/g, ' ')
      .trim();
  }

  static success(message: string, data?: unknown): string {
    let result = `✅ **Success**: ${message}\n\n`;

    if (data) {
      result += this.formatMarkdown(data, 'concise');
    }

    return result;
  }

  static error(message: string, suggestion?: string): string {
    let result = `❌ **Error**: ${message}\n\n`;

    if (suggestion) {
      result += `💡 **Suggestion**: ${suggestion}`;
    }

    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format bytes to human-readable size
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const units = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  return `${(bytes / Math.pow(1024, i)).toFixed(i === 0 ? 0 : 2)} ${units[i]}`;
}
