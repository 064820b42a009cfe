/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LogInstant } from '../types/index.js';
import { MalformedTimestampError } from './errors.js';

// 2012-05-30 09:28:56.233-0700
export const TIMESTAMP_PREFIX_LENGTH = 28;
const OFFSET_LENGTH = 5;

const PREFIX_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})\.(\d{3})[+-]\d{4}$/;

/**
 * Parses the fixed-width timestamp prefix of a log line.
 *
 * The timezone offset must be present and well formed but is not applied:
 * two lines written at the same moment from servers in different zones
 * compare as different instants.
 */
export const parseLogInstant = (line: string): LogInstant => {
  if (line.length < TIMESTAMP_PREFIX_LENGTH) {
    throw new MalformedTimestampError(line, 'line shorter than timestamp prefix');
  }
  const prefix = line.slice(0, TIMESTAMP_PREFIX_LENGTH);
  const match = PREFIX_RE.exec(prefix);
  if (!match) {
    throw new MalformedTimestampError(line, 'prefix does not match YYYY-MM-DD HH:MM:SS.mmm+HHMM');
  }

  const [year, month, day, hour, minute, second, millis] = match.slice(1, 8).map(Number);
  // Date.UTC would read years 0-99 as 1900-1999, so the fields are set one by one.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  const epochMillis = date.getTime();
  const text = prefix.slice(0, TIMESTAMP_PREFIX_LENGTH - OFFSET_LENGTH);

  // 2012-02-30 rolls over into March; reject anything that does not survive the round trip.
  if (Number.isNaN(epochMillis) || renderEpoch(epochMillis) !== text) {
    throw new MalformedTimestampError(line, 'no such calendar date or time');
  }
  return { epochMillis, text };
};

export const formatLogInstant = (instant: LogInstant): string => instant.text;

export const compareInstants = (a: LogInstant, b: LogInstant): number => a.epochMillis - b.epochMillis;

const renderEpoch = (epochMillis: number): string => {
  const iso = new Date(epochMillis).toISOString();
  // 2012-05-30T09:28:56.233Z -> 2012-05-30 09:28:56.233
  return `${iso.slice(0, 10)} ${iso.slice(11, 23)}`;
};
