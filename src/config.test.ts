import { describe, it, expect } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { DEFAULT_PIPELINE_SETTINGS, loadRelayConfig, resolveRelayConfig } from "./config.js";

const minimalPipeline = { name: "hall", port: 8888, width: 320, height: 240, source: "static" };

describe("resolveRelayConfig", () => {
  it("fills every unspecified field from the built-in defaults", () => {
    const result = resolveRelayConfig({ pipelines: [minimalPipeline] }, {});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.config.metricsPort).toBe(9100);
    expect(result.config.pipelines[0]).toEqual({ ...DEFAULT_PIPELINE_SETTINGS, ...minimalPipeline });
  });

  it("layers file defaults under per-pipeline overrides", () => {
    const result = resolveRelayConfig(
      {
        defaults: { targetFps: 20, thresholdMin: 15, sourceOptions: { speed: 4, blockSize: 8 } },
        pipelines: [
          { ...minimalPipeline, targetFps: 30, sourceOptions: { speed: 2 } },
          { ...minimalPipeline, name: "lobby", port: 8889 },
        ],
      },
      {},
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [hall, lobby] = result.config.pipelines;
    expect(hall.targetFps).toBe(30);
    expect(hall.thresholdMin).toBe(15);
    expect(hall.sourceOptions).toEqual({ speed: 2, blockSize: 8 });
    expect(lobby.targetFps).toBe(20);
    expect(lobby.sourceOptions).toEqual({ speed: 4, blockSize: 8 });
  });

  it("takes METRICS_PORT from the environment, 0 disabling the endpoint", () => {
    const result = resolveRelayConfig({ metricsPort: 9200, pipelines: [minimalPipeline] }, { METRICS_PORT: "0" });
    expect(result.ok && result.config.metricsPort).toBe(0);
  });

  it("collects every field error", () => {
    const result = resolveRelayConfig(
      {
        pipelines: [{ ...minimalPipeline, maxChunkDataSize: 1, source: "webcam", thresholdMax: 5 }],
      },
      {},
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toHaveLength(3);
    expect(result.errors[0]).toBe('pipelines[0].source: expected one of static, test-pattern, bars, got "webcam"');
    expect(result.errors[1]).toMatch(/^pipelines\[0\]\.maxChunkDataSize: expected an integer in \[2, /);
    expect(result.errors[2]).toBe("pipelines[0].thresholdMax: expected an integer in [10, 765], got 5");
  });

  it("requires name, port and size on each pipeline", () => {
    const result = resolveRelayConfig({ pipelines: [{ source: "bars" }] }, {});
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors.map((e) => e.split(":")[0])).toEqual([
      "pipelines[0].name",
      "pipelines[0].port",
      "pipelines[0].width",
      "pipelines[0].height",
    ]);
  });

  it("rejects duplicate names and ports", () => {
    const result = resolveRelayConfig({ pipelines: [minimalPipeline, minimalPipeline] }, {});
    expect(result).toEqual({
      ok: false,
      errors: ['pipelines: duplicate name "hall"', "pipelines: port 8888 used twice"],
    });
  });

  it("rejects a low-water mark above the queue capacity", () => {
    const result = resolveRelayConfig({ pipelines: [{ ...minimalPipeline, queueCapacity: 3, lowWaterMark: 4 }] }, {});
    expect(result).toEqual({
      ok: false,
      errors: ["pipelines[0].lowWaterMark: expected an integer in [1, 3], got 4"],
    });
  });

  it("requires whole-number thresholds and steps", () => {
    const result = resolveRelayConfig({ pipelines: [{ ...minimalPipeline, thresholdStepUp: 2.5 }] }, {});
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toEqual(["pipelines[0].thresholdStepUp: expected an integer in [0, 765], got 2.5"]);
  });

  it("rejects documents without pipelines", () => {
    expect(resolveRelayConfig({ pipelines: [] }, {})).toEqual({
      ok: false,
      errors: ["pipelines: expected a non-empty array"],
    });
    expect(resolveRelayConfig("nope", {})).toEqual({ ok: false, errors: ["config: expected a JSON object"] });
  });
});

describe("loadRelayConfig", () => {
  it("reads and resolves a file", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "relay-config-"));
    const file = path.join(dir, "pipelines.json");
    await writeFile(file, JSON.stringify({ pipelines: [minimalPipeline] }));

    const result = await loadRelayConfig(file, {});
    expect(result.ok && result.config.pipelines[0].name).toBe("hall");
  });

  it("reports malformed JSON", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "relay-config-"));
    const file = path.join(dir, "broken.json");
    await writeFile(file, "{ pipelines: ");

    const result = await loadRelayConfig(file, {});
    expect(result.ok).toBe(false);
    expect(!result.ok && result.errors[0].startsWith(`${file}: invalid JSON`)).toBe(true);
  });

  it("reports a missing file", async () => {
    const result = await loadRelayConfig(path.join(tmpdir(), "relay-config-missing", "none.json"), {});
    expect(result.ok).toBe(false);
  });
});
