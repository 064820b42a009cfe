/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Formats a structured, multiline diagnostic block.
 * Each non-empty field is printed on its own line for readability.
 */
export const formatLogBlock = (
  label: string,
  fields: Array<[string, string | number | undefined | null]>,
): string => {
  const filtered = fields.filter(
    (field): field is [string, string | number] =>
      field[1] !== undefined && field[1] !== null && field[1] !== '',
  );
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[election-history] ${label}:`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  return lines.join('\n');
};

/**
 * Unified console logger. Everything goes to stderr: stdout carries only
 * the report.
 */
export const logConsole = (
  level: LogLevel,
  label: string,
  fields: Array<[string, string | number | undefined | null]>,
): void => {
  const output = formatLogBlock(label, fields);
  if (level === 'warn') {
    console.warn(output);
  } else {
    console.error(output);
  }
};
