/**
 * Closed value sets for individual global options
 */

import { LOG_LEVELS } from '../types/logger';
import { defineEnum } from './enum-descriptor';

/**
 * Values accepted by `--level`
 */
export const LogLevelEnum = defineEnum('LogLevel', LOG_LEVELS);

/**
 * Values accepted by `--process-execution-speculation-strategy`
 */
export const SPECULATION_STRATEGIES = ['remote_first', 'local_first', 'none'] as const;

export type SpeculationStrategy = (typeof SPECULATION_STRATEGIES)[number];
