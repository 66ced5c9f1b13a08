// Per-pipeline counters, gauges and duration summaries, exported as JSON by the metrics server.

export type CounterName =
  | "frames_generated"
  | "frames_processed"
  | "frames_dropped"
  | "frames_unchanged"
  | "source_errors"
  | "diff_failures"
  | "packets_sent"
  | "bytes_sent"
  | "send_failures"
  | "connection_errors"
  | "session_takeovers"
  | "reconnections";

export type GaugeName = "queue_depth" | "threshold" | "achieved_fps" | "client_connected" | "chunks_per_frame";

/** Summaries of durations in seconds (`chunks` counts packets per frame). */
export type SummaryName = "generate" | "diff" | "packetize" | "send" | "frame_total" | "chunks";

export interface Summary {
  count: number;
  sum: number;
  min: number;
  max: number;
  last: number;
}

export interface TelemetrySnapshot {
  counters: Record<CounterName, number>;
  gauges: Record<GaugeName, number>;
  summaries: Record<SummaryName, Summary | null>;
}

function emptyCounters(): Record<CounterName, number> {
  return {
    frames_generated: 0,
    frames_processed: 0,
    frames_dropped: 0,
    frames_unchanged: 0,
    source_errors: 0,
    diff_failures: 0,
    packets_sent: 0,
    bytes_sent: 0,
    send_failures: 0,
    connection_errors: 0,
    session_takeovers: 0,
    reconnections: 0,
  };
}

function emptyGauges(): Record<GaugeName, number> {
  return { queue_depth: 0, threshold: 0, achieved_fps: 0, client_connected: 0, chunks_per_frame: 0 };
}

export class PipelineTelemetry {
  readonly pipeline: string;
  private readonly counters = emptyCounters();
  private readonly gauges = emptyGauges();
  private readonly summaries = new Map<SummaryName, Summary>();

  constructor(pipeline: string) {
    this.pipeline = pipeline;
  }

  increment(name: CounterName, by: number = 1): void {
    this.counters[name] += by;
  }

  setGauge(name: GaugeName, value: number): void {
    this.gauges[name] = value;
  }

  observe(name: SummaryName, value: number): void {
    const existing = this.summaries.get(name);
    if (!existing) {
      this.summaries.set(name, { count: 1, sum: value, min: value, max: value, last: value });
      return;
    }
    existing.count++;
    existing.sum += value;
    existing.min = Math.min(existing.min, value);
    existing.max = Math.max(existing.max, value);
    existing.last = value;
  }

  counter(name: CounterName): number {
    return this.counters[name];
  }

  gauge(name: GaugeName): number {
    return this.gauges[name];
  }

  summary(name: SummaryName): Summary | null {
    const s = this.summaries.get(name);
    return s ? { ...s } : null;
  }

  snapshot(): TelemetrySnapshot {
    return {
      counters: { ...this.counters },
      gauges: { ...this.gauges },
      summaries: {
        generate: this.summary("generate"),
        diff: this.summary("diff"),
        packetize: this.summary("packetize"),
        send: this.summary("send"),
        frame_total: this.summary("frame_total"),
        chunks: this.summary("chunks"),
      },
    };
  }
}

/** Owns one PipelineTelemetry per pipeline name. */
export class TelemetryRegistry {
  private readonly pipelines = new Map<string, PipelineTelemetry>();

  /** Returns the existing telemetry for `pipeline`, or creates it. */
  forPipeline(pipeline: string): PipelineTelemetry {
    let telemetry = this.pipelines.get(pipeline);
    if (!telemetry) {
      telemetry = new PipelineTelemetry(pipeline);
      this.pipelines.set(pipeline, telemetry);
    }
    return telemetry;
  }

  get names(): string[] {
    return [...this.pipelines.keys()];
  }

  snapshot(): Record<string, TelemetrySnapshot> {
    const out: Record<string, TelemetrySnapshot> = {};
    for (const [name, telemetry] of this.pipelines) out[name] = telemetry.snapshot();
    return out;
  }
}
