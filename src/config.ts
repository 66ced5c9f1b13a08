/**
 * Relay configuration: a JSON file with shared `defaults` and a `pipelines`
 * array. Each pipeline is the built-in defaults, overlaid by the file's
 * defaults, overlaid by the pipeline's own entries (`sourceOptions` merged
 * one level deep), then validated field by field.
 *
 * Example:
 *   {
 *     "metricsPort": 9100,
 *     "defaults": { "targetFps": 15, "maxChunkDataSize": 8192 },
 *     "pipelines": [
 *       { "name": "hall-display", "port": 8888, "width": 320, "height": 240, "source": "bars" }
 *     ]
 *   }
 */

import { readFile } from "node:fs/promises";
import { MAX_PIXEL_DELTA } from "./diff-engine.js";
import { MAX_U32 } from "./packet-codec.js";
import { MIN_CHUNK_DATA_SIZE } from "./packetizer.js";
import { FRAME_SOURCE_KINDS } from "./frame-sources.js";
import { MAX_DIMENSION } from "./raster.js";
import type { FrameSourceKind, PipelineConfig, RelayConfig, SourceOptions } from "./types.js";

export const DEFAULT_CONFIG_PATH = "config/pipelines.json";
export const DEFAULT_METRICS_PORT = 9100;

/** Everything a pipeline may inherit; name, port, size and source are per pipeline. */
export type PipelineDefaults = Omit<PipelineConfig, "name" | "port" | "width" | "height" | "source">;

export const DEFAULT_PIPELINE_SETTINGS: PipelineDefaults = {
  host: "0.0.0.0",
  sourceOptions: {},
  maxChunkDataSize: 8192,
  targetFps: 15,
  thresholdMin: 10,
  thresholdMax: 200,
  thresholdStepUp: 8,
  thresholdStepDown: 4,
  fpsHistorySize: 10,
  hysteresis: 0.1,
  queueCapacity: 5,
  lowWaterMark: 2,
  generationIntervalMs: 50,
  socketTimeoutMs: 2000,
  blockSize: 16,
  dithering: true,
};

export type ConfigResult = { ok: true; config: RelayConfig } | { ok: false; errors: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSourceKind(value: unknown): value is FrameSourceKind {
  return FRAME_SOURCE_KINDS.some((kind) => kind === value);
}

// ─── Field reader ───────────────────────────────────────────────────────────────

/** Reads typed fields out of a merged raw object, collecting every error. */
class FieldReader {
  constructor(
    private readonly raw: Record<string, unknown>,
    private readonly where: string,
    private readonly errors: string[],
  ) {}

  private fail(key: string, expected: string): void {
    this.errors.push(`${this.where}.${key}: expected ${expected}, got ${JSON.stringify(this.raw[key])}`);
  }

  number(key: string, min: number, max: number = Number.MAX_SAFE_INTEGER, integer = false): number {
    const value = this.raw[key];
    if (typeof value === "number" && Number.isFinite(value) && value >= min && value <= max && (!integer || Number.isInteger(value))) {
      return value;
    }
    this.fail(key, `${integer ? "an integer" : "a number"} in [${min}, ${max}]`);
    return min;
  }

  integer(key: string, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
    return this.number(key, min, max, true);
  }

  string(key: string): string {
    const value = this.raw[key];
    if (typeof value === "string" && value.length > 0) return value;
    this.fail(key, "a non-empty string");
    return "";
  }

  boolean(key: string): boolean {
    const value = this.raw[key];
    if (typeof value === "boolean") return value;
    this.fail(key, "a boolean");
    return false;
  }

  source(key: string): FrameSourceKind {
    const value = this.raw[key];
    if (isSourceKind(value)) return value;
    this.fail(key, `one of ${FRAME_SOURCE_KINDS.join(", ")}`);
    return "static";
  }

  sourceOptions(key: string): SourceOptions {
    const value = this.raw[key];
    const out: SourceOptions = {};
    if (!isRecord(value)) {
      this.fail(key, "an object");
      return out;
    }
    for (const [name, option] of Object.entries(value)) {
      if (typeof option === "string" || typeof option === "number" || typeof option === "boolean") {
        out[name] = option;
      } else {
        this.errors.push(`${this.where}.${key}.${name}: expected a string, number or boolean`);
      }
    }
    return out;
  }
}

// ─── Resolution ─────────────────────────────────────────────────────────────────

function mergePipeline(
  defaults: Record<string, unknown>,
  overrides: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...DEFAULT_PIPELINE_SETTINGS, ...defaults, ...overrides };
  for (const [key, value] of Object.entries(overrides)) {
    const base = defaults[key];
    if (isRecord(base) && isRecord(value)) merged[key] = { ...base, ...value };
  }
  return merged;
}

function readPipeline(raw: Record<string, unknown>, where: string, errors: string[]): PipelineConfig {
  const f = new FieldReader(raw, where, errors);
  const thresholdMin = f.integer("thresholdMin", 0, MAX_PIXEL_DELTA);
  const queueCapacity = f.integer("queueCapacity", 1, 10_000);

  const config: PipelineConfig = {
    name: f.string("name"),
    host: f.string("host"),
    port: f.integer("port", 1, 65535),
    width: f.integer("width", 1, MAX_DIMENSION),
    height: f.integer("height", 1, MAX_DIMENSION),
    source: f.source("source"),
    sourceOptions: f.sourceOptions("sourceOptions"),
    maxChunkDataSize: f.integer("maxChunkDataSize", MIN_CHUNK_DATA_SIZE, MAX_U32),
    targetFps: f.number("targetFps", Number.MIN_VALUE, 1000),
    thresholdMin,
    thresholdMax: f.integer("thresholdMax", thresholdMin, MAX_PIXEL_DELTA),
    thresholdStepUp: f.integer("thresholdStepUp", 0, MAX_PIXEL_DELTA),
    thresholdStepDown: f.integer("thresholdStepDown", 0, MAX_PIXEL_DELTA),
    fpsHistorySize: f.integer("fpsHistorySize", 1, 10_000),
    hysteresis: f.number("hysteresis", 0, 0.99),
    queueCapacity,
    lowWaterMark: f.integer("lowWaterMark", 1, queueCapacity),
    generationIntervalMs: f.number("generationIntervalMs", 0, 60_000),
    socketTimeoutMs: f.number("socketTimeoutMs", 1, 600_000),
    blockSize: f.integer("blockSize", 1, MAX_DIMENSION),
    dithering: f.boolean("dithering"),
  };
  return config;
}

function resolveMetricsPort(raw: Record<string, unknown>, env: NodeJS.ProcessEnv, errors: string[]): number {
  const fromEnv = env.METRICS_PORT;
  const value = fromEnv !== undefined && fromEnv !== "" ? Number(fromEnv) : raw.metricsPort ?? DEFAULT_METRICS_PORT;
  if (typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 65535) return value;
  errors.push(`metricsPort: expected an integer in [0, 65535], got ${JSON.stringify(fromEnv ?? raw.metricsPort)}`);
  return DEFAULT_METRICS_PORT;
}

/** Merge and validate a parsed configuration document. */
export function resolveRelayConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  if (!isRecord(raw)) return { ok: false, errors: ["config: expected a JSON object"] };

  const errors: string[] = [];
  const defaults = raw.defaults ?? {};
  if (!isRecord(defaults)) errors.push("defaults: expected an object");
  const pipelinesRaw = raw.pipelines;
  if (!Array.isArray(pipelinesRaw) || pipelinesRaw.length === 0) {
    errors.push("pipelines: expected a non-empty array");
  }

  const metricsPort = resolveMetricsPort(raw, env, errors);
  const pipelines: PipelineConfig[] = [];

  if (Array.isArray(pipelinesRaw) && isRecord(defaults)) {
    pipelinesRaw.forEach((entry: unknown, i) => {
      if (!isRecord(entry)) {
        errors.push(`pipelines[${i}]: expected an object`);
        return;
      }
      pipelines.push(readPipeline(mergePipeline(defaults, entry), `pipelines[${i}]`, errors));
    });
  }

  const seenNames = new Set<string>();
  const seenPorts = new Set<number>();
  for (const p of pipelines) {
    if (seenNames.has(p.name)) errors.push(`pipelines: duplicate name "${p.name}"`);
    if (seenPorts.has(p.port)) errors.push(`pipelines: port ${p.port} used twice`);
    if (metricsPort !== 0 && p.port === metricsPort) errors.push(`pipelines: port ${p.port} clashes with metricsPort`);
    seenNames.add(p.name);
    seenPorts.add(p.port);
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, config: { metricsPort, pipelines } };
}

/** Read, parse and resolve the configuration file at `path`. */
export async function loadRelayConfig(
  path: string = process.env.RELAY_CONFIG || DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ConfigResult> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    return { ok: false, errors: [`${path}: ${err instanceof Error ? err.message : String(err)}`] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return { ok: false, errors: [`${path}: invalid JSON (${err instanceof Error ? err.message : String(err)})`] };
  }
  return resolveRelayConfig(parsed, env);
}
