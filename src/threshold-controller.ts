/**
 * Adaptive threshold controller.
 *
 * Steers the processing loop's achieved frame rate toward `targetFps` by
 * moving the diff threshold: falling behind raises it (fewer, smaller dirty
 * rects), running ahead lowers it (more fidelity). A dead band of
 * ±hysteresis around the target holds the threshold still.
 *
 * The state is a plain object owned by one processing loop. It is passed into
 * the diff (read) and into updateThreshold() (write) each cycle.
 */

export interface ThresholdSettings {
  min: number;
  max: number;
  /** Starting threshold; defaults to `min`. */
  initial?: number;
  stepUp: number;
  stepDown: number;
  targetFps: number;
  /** Fraction of targetFps, e.g. 0.1 for ±10%. */
  hysteresis: number;
  /** Number of per-frame durations averaged into measuredFps. */
  historySize: number;
}

/**
 * Fixed-capacity ring buffer of processing durations (seconds).
 * Keeps a running sum so measuredFps is O(1).
 */
export class DurationHistory {
  private readonly values: Float64Array;
  private next: number;
  private count: number;
  private total: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.values = new Float64Array(capacity);
    this.next = 0;
    this.count = 0;
    this.total = 0;
  }

  push(seconds: number): void {
    if (this.count === this.values.length) {
      this.total -= this.values[this.next];
    } else {
      this.count++;
    }
    this.values[this.next] = seconds;
    this.total += seconds;
    this.next = (this.next + 1) % this.values.length;
  }

  sum(): number {
    return this.total;
  }

  clear(): void {
    this.values.fill(0);
    this.next = 0;
    this.count = 0;
    this.total = 0;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.values.length;
  }

  get isFull(): boolean {
    return this.count === this.values.length;
  }
}

export interface ThresholdState {
  current: number;
  readonly min: number;
  readonly max: number;
  readonly stepUp: number;
  readonly stepDown: number;
  readonly targetFps: number;
  readonly hysteresis: number;
  readonly fpsHistory: DurationHistory;
}

export type ThresholdAdjustment = "raised" | "lowered" | "unchanged" | "warming_up";

export interface ThresholdUpdate {
  adjustment: ThresholdAdjustment;
  /** K / sum(history); null until the history is full. */
  measuredFps: number | null;
  threshold: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function createThresholdState(settings: ThresholdSettings): ThresholdState {
  const { min, max, stepUp, stepDown, targetFps, hysteresis, historySize } = settings;
  if (!(min >= 0) || !(max >= min)) {
    throw new RangeError(`Invalid threshold range [${min}, ${max}]`);
  }
  if (!(stepUp >= 0) || !(stepDown >= 0)) {
    throw new RangeError("Threshold steps must be non-negative");
  }
  if (!(targetFps > 0)) {
    throw new RangeError(`targetFps must be positive, got ${targetFps}`);
  }
  if (!(hysteresis >= 0 && hysteresis < 1)) {
    throw new RangeError(`hysteresis must be in [0, 1), got ${hysteresis}`);
  }

  return {
    current: clamp(settings.initial ?? min, min, max),
    min,
    max,
    stepUp,
    stepDown,
    targetFps,
    hysteresis,
    fpsHistory: new DurationHistory(historySize),
  };
}

/**
 * Achieved frame rate over the history window, or null while it is still
 * filling. A zero-duration window counts as infinitely fast.
 */
export function measuredFps(state: ThresholdState): number | null {
  const history = state.fpsHistory;
  if (!history.isFull) return null;
  const total = history.sum();
  return total > 0 ? history.size / total : Number.POSITIVE_INFINITY;
}

/**
 * Record one frame's processing duration and adjust `state.current`.
 * The threshold only moves once the history window is full.
 */
export function updateThreshold(state: ThresholdState, durationSeconds: number): ThresholdUpdate {
  state.fpsHistory.push(Math.max(0, durationSeconds));

  const fps = measuredFps(state);
  if (fps === null) {
    return { adjustment: "warming_up", measuredFps: null, threshold: state.current };
  }

  const before = state.current;
  if (fps < state.targetFps * (1 - state.hysteresis)) {
    state.current = clamp(before + state.stepUp, state.min, state.max);
  } else if (fps > state.targetFps * (1 + state.hysteresis)) {
    state.current = clamp(before - state.stepDown, state.min, state.max);
  }

  const adjustment: ThresholdAdjustment =
    state.current > before ? "raised" : state.current < before ? "lowered" : "unchanged";
  return { adjustment, measuredFps: fps, threshold: state.current };
}

/** Return the state to its starting point for a new session. */
export function resetThresholdState(state: ThresholdState, initial: number = state.min): void {
  state.current = clamp(initial, state.min, state.max);
  state.fpsHistory.clear();
}
