/**
 * @fileoverview History configuration defaults and validation
 */

import { resolveDataDir } from './utils/document-identity';
import { DEFAULT_GROUPING_POLICY } from './utils/grouping-policy';
import {
  type GroupingPolicy,
  type HistoryConfig
} from './types/common';

const DEFAULT_HOT_CAPACITY = 500;
const DEFAULT_MAX_HISTORY_DEPTH = 10_000;
const DEFAULT_GROUP_TIMEOUT_MS = 500;

interface HistoryConfigOverrides {
  hotCapacity?: number;
  maxHistoryDepth?: number;
  groupTimeout?: number;
  dataDir?: string;
  grouping?: Partial<GroupingPolicy>;
}

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Build a complete configuration from partial overrides
 */
function createHistoryConfig(overrides: HistoryConfigOverrides = {}): HistoryConfig {
  const config: HistoryConfig = {
    hotCapacity: overrides.hotCapacity ?? DEFAULT_HOT_CAPACITY,
    maxHistoryDepth: overrides.maxHistoryDepth ?? DEFAULT_MAX_HISTORY_DEPTH,
    groupTimeout: overrides.groupTimeout ?? DEFAULT_GROUP_TIMEOUT_MS,
    dataDir: overrides.dataDir ?? resolveDataDir(),
    grouping: {
      ...DEFAULT_GROUPING_POLICY,
      ...overrides.grouping
    }
  };

  assertPositiveInteger(config.hotCapacity, 'hotCapacity');
  assertPositiveInteger(config.maxHistoryDepth, 'maxHistoryDepth');
  if (!Number.isFinite(config.groupTimeout) || config.groupTimeout < 0) {
    throw new RangeError(`groupTimeout must be a non-negative number of milliseconds, got ${config.groupTimeout}`);
  }

  return config;
}

export {
  createHistoryConfig,
  DEFAULT_HOT_CAPACITY,
  DEFAULT_MAX_HISTORY_DEPTH,
  DEFAULT_GROUP_TIMEOUT_MS,
  type HistoryConfigOverrides
};
