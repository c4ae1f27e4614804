import { InvalidArgumentError } from '@observa/core';

/**
 * How to walk from `start` to `stop`. Give exactly one of the two.
 */
export interface TimeRangeOptions {
  /** Distance between consecutive dates, in milliseconds; negative walks backwards */
  step?: number;
  /** Number of dates to produce, evenly spaced from `start` towards `stop` */
  steps?: number;
}

function assertValidDate(value: Date, argument: 'start' | 'stop'): void {
  if (Number.isNaN(value.getTime())) {
    throw new InvalidArgumentError(`tRange() received an invalid ${argument} date`, { [argument]: String(value) });
  }
}

function validateStep(step: number, span: number): void {
  if (!Number.isFinite(step) || step === 0) {
    throw new InvalidArgumentError('step must be a non-zero, finite number of milliseconds', { step });
  }
  if (span > 0 && step < 0) {
    throw new InvalidArgumentError('step must be positive when start is before stop', { step, span });
  }
  if (span < 0 && step > 0) {
    throw new InvalidArgumentError('step must be negative when start is after stop', { step, span });
  }
}

function validateSteps(steps: number, span: number): void {
  if (!Number.isInteger(steps) || steps <= 0) {
    throw new InvalidArgumentError('steps must be a positive integer', { steps });
  }
  if (span === 0) {
    throw new InvalidArgumentError('No range can be divided into steps when start equals stop', { steps });
  }
}

function* byStep(start: number, stop: number, step: number): Generator<Date> {
  for (let k = 0; ; k++) {
    const time = start + k * step;
    if (step > 0 ? time >= stop : time <= stop) return;
    yield new Date(time);
  }
}

function* bySteps(start: number, span: number, steps: number): Generator<Date> {
  for (let k = 0; k < steps; k++) {
    yield new Date(start + Math.trunc((k * span) / steps));
  }
}

/**
 * Dates from `start` towards `stop`, like a numeric range: `stop` itself
 * is never produced.
 *
 * Arguments are checked when `tRange` is called, not when iteration
 * starts. The generator is lazy and single-use.
 *
 * @example
 * ```typescript
 * const start = new Date(Date.UTC(2024, 0, 1, 0, 0));
 * const stop = new Date(Date.UTC(2024, 0, 1, 1, 0));
 *
 * [...tRange(start, stop, { step: 15 * 60_000 })].map((d) => d.toISOString());
 * // 00:00, 00:15, 00:30, 00:45
 *
 * [...tRange(start, stop, { steps: 4 })]; // the same four dates
 * ```
 *
 * @throws {@link InvalidArgumentError} when both or neither of `step` and
 * `steps` are given, `steps` is not a positive integer, `step` is zero or
 * points away from `stop`, or `steps` is given with `start` equal to `stop`
 */
export function tRange(start: Date, stop: Date, options: TimeRangeOptions): Generator<Date> {
  assertValidDate(start, 'start');
  assertValidDate(stop, 'stop');

  const { step, steps } = options;
  const from = start.getTime();
  const span = stop.getTime() - from;

  if (step !== undefined && steps === undefined) {
    validateStep(step, span);
    return byStep(from, stop.getTime(), step);
  }

  if (steps !== undefined && step === undefined) {
    validateSteps(steps, span);
    return bySteps(from, span, steps);
  }

  throw new InvalidArgumentError('tRange() requires either step or steps, but not both', { step, steps });
}
