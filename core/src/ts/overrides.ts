/**
 * Override planning: the real-time bytes that take an override from the value
 * the controller last reported to a target value.
 */

import { OverrideKind, RealtimeCommand } from "@grbl-node/types";

export const MIN_OVERRIDE = 10;
export const MAX_OVERRIDE = 200;
const COARSE_STEP = 10;

/** The three rapid override levels GRBL accepts */
export const RAPID_OVERRIDE_LEVELS = [25, 50, 100] as const;

interface StepCommands {
  reset: RealtimeCommand;
  coarsePlus: RealtimeCommand;
  coarseMinus: RealtimeCommand;
  finePlus: RealtimeCommand;
  fineMinus: RealtimeCommand;
}

const FEED_COMMANDS: StepCommands = {
  reset: RealtimeCommand.FEED_OVERRIDE_RESET,
  coarsePlus: RealtimeCommand.FEED_OVERRIDE_COARSE_PLUS,
  coarseMinus: RealtimeCommand.FEED_OVERRIDE_COARSE_MINUS,
  finePlus: RealtimeCommand.FEED_OVERRIDE_FINE_PLUS,
  fineMinus: RealtimeCommand.FEED_OVERRIDE_FINE_MINUS,
};

const SPINDLE_COMMANDS: StepCommands = {
  reset: RealtimeCommand.SPINDLE_OVERRIDE_RESET,
  coarsePlus: RealtimeCommand.SPINDLE_OVERRIDE_COARSE_PLUS,
  coarseMinus: RealtimeCommand.SPINDLE_OVERRIDE_COARSE_MINUS,
  finePlus: RealtimeCommand.SPINDLE_OVERRIDE_FINE_PLUS,
  fineMinus: RealtimeCommand.SPINDLE_OVERRIDE_FINE_MINUS,
};

function clampOverride(value: number): number {
  return Math.min(MAX_OVERRIDE, Math.max(MIN_OVERRIDE, Math.round(value)));
}

// Coarse steps never pass the target, so no intermediate value is clamped
function steps(
  from: number,
  to: number,
  commands: StepCommands
): RealtimeCommand[] {
  const delta = to - from;
  const coarse = Math.trunc(delta / COARSE_STEP);
  const fine = delta - coarse * COARSE_STEP;
  return [
    ...Array<RealtimeCommand>(Math.abs(coarse)).fill(
      coarse > 0 ? commands.coarsePlus : commands.coarseMinus
    ),
    ...Array<RealtimeCommand>(Math.abs(fine)).fill(
      fine > 0 ? commands.finePlus : commands.fineMinus
    ),
  ];
}

/** Rapid override level closest to `value` */
export function nearestRapidLevel(value: number): number {
  let best: number = RAPID_OVERRIDE_LEVELS[0];
  for (const level of RAPID_OVERRIDE_LEVELS) {
    if (Math.abs(level - value) < Math.abs(best - value)) best = level;
  }
  return best;
}

/**
 * Shortest real-time command sequence that moves an override from `current`
 * to `target` percent.
 *
 * Feed and spindle targets are clamped to 10-200 % and reached either from
 * the current value or from a reset to 100 %, whichever takes fewer bytes.
 * Rapid targets snap to the nearest of 25, 50 and 100 %.
 *
 * @example
 * ```typescript
 * planOverride(OverrideKind.FEED, 100, 125);
 * // [COARSE_PLUS, COARSE_PLUS, FINE_PLUS x5]
 * planOverride(OverrideKind.FEED, 150, 100); // [FEED_OVERRIDE_RESET]
 * ```
 *
 * @throws RangeError when either percentage is not a finite number
 */
export function planOverride(
  kind: OverrideKind,
  current: number,
  target: number
): RealtimeCommand[] {
  if (!Number.isFinite(current) || !Number.isFinite(target)) {
    throw new RangeError(
      `Override percentages must be finite numbers, got ${current} and ${target}`
    );
  }
  if (kind === OverrideKind.RAPID) {
    const level = nearestRapidLevel(target);
    if (level === nearestRapidLevel(current)) return [];
    if (level === 25) return [RealtimeCommand.RAPID_OVERRIDE_LOW];
    if (level === 50) return [RealtimeCommand.RAPID_OVERRIDE_MEDIUM];
    return [RealtimeCommand.RAPID_OVERRIDE_RESET];
  }

  const commands = kind === OverrideKind.FEED ? FEED_COMMANDS : SPINDLE_COMMANDS;
  const from = clampOverride(current);
  const to = clampOverride(target);
  if (from === to) return [];

  const direct = steps(from, to, commands);
  const viaReset = [commands.reset, ...steps(100, to, commands)];
  return viaReset.length < direct.length ? viaReset : direct;
}
