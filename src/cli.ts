#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { main } from './cli/main.js';

main().catch((error: unknown) => {
  console.error('Failed to build election history:', error);
  process.exit(1);
});
