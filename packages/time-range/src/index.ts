/**
 * Date ranges for `@observa` projects.
 *
 * @module @observa/time-range
 */

export { tRange, type TimeRangeOptions } from './t-range.js';
