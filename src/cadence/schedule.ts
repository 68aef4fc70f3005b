import type { AnalyzedProgram, StreamId } from './ir.js';
import { Rational, gcdAll, lcmAll } from './rational.js';

export interface Deadline {
  /** Time to wait since the previous deadline, in seconds. */
  pause: Rational;
  due: StreamId[];
}

export interface Schedule {
  /** Longest wait between checks that still meets every deadline. */
  gcd: Rational;
  hyperPeriod: Rational;
  /** One hyper-period of deadlines; the sequence repeats from there. */
  deadlines: Deadline[];
}

/**
 * Static timetable for the periodic outputs and triggers of a program, or
 * `null` when it has none.
 *
 * With `a @ 2Hz`, `b @ 1Hz` and `c @ 0.5Hz` the gcd is 0.5s, the
 * hyper-period 2s, and the deadlines are `[a]`, `[a, b]`, `[a]`, `[a, b, c]`,
 * each 0.5s after the previous one.
 */
export function buildSchedule(program: AnalyzedProgram): Schedule | null {
  const position = new Map(program.evaluationOrder.map((id, index) => [id, index]));
  const timed: Array<{ id: StreamId; period: Rational }> = [];
  for (const stream of program.streams) {
    if (stream.kind === 'input' || stream.pacing.kind !== 'periodic') continue;
    timed.push({ id: stream.id, period: stream.pacing.frequency.inverse() });
  }
  if (timed.length === 0) return null;

  const periods = timed.map(entry => entry.period);
  const gcd = gcdAll(periods);
  const hyperPeriod = lcmAll(periods);
  const steps = Number(hyperPeriod.div(gcd).floor());

  const deadlines: Deadline[] = [];
  let idle = 0;
  for (let step = 1; step <= steps; step++) {
    const due = timed
      .filter(entry => step % Number(entry.period.div(gcd).floor()) === 0)
      .map(entry => entry.id)
      .sort((a, b) => (position.get(a) ?? a) - (position.get(b) ?? b));
    // The last step is always due, so no idle slots remain at the end.
    if (due.length === 0) {
      idle++;
      continue;
    }
    deadlines.push({ pause: gcd.mul(Rational.of(idle + 1)), due });
    idle = 0;
  }
  return { gcd, hyperPeriod, deadlines };
}
