/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Forward-only cursor over the lines of one scan pass.
 *
 * Every scan shares the same position, so a line consumed while looking for
 * one kind of evidence is never offered to a later scan. Create a new cursor
 * for each pass over a file.
 */
export class LineCursor {
  private index = 0;

  constructor(private readonly lines: readonly string[]) {}

  get position(): number {
    return this.index;
  }

  get done(): boolean {
    return this.index >= this.lines.length;
  }

  next(): string | undefined {
    if (this.done) {
      return undefined;
    }
    const line = this.lines[this.index];
    this.index += 1;
    return line;
  }

  /**
   * Advances until `match` returns a value for a line, consuming that line.
   * Returns undefined once the lines run out.
   */
  scanUntil<T>(match: (line: string) => T | undefined): T | undefined {
    for (let line = this.next(); line !== undefined; line = this.next()) {
      const result = match(line);
      if (result !== undefined) {
        return result;
      }
    }
    return undefined;
  }
}
