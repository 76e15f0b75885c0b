#!/usr/bin/env tsx
/**
 * Spatial Benchmark
 *
 * Usage: npm run bench -w @gridsight/spatial -- [options]
 *
 * Scenarios:
 *   fov/open      Field of view on an open map
 *   fov/walls     Same map with random walls
 *   astar/walled  Four-way A* across a map split by walls
 *
 * Options:
 *   -w <width>    Width (default: 45)
 *   -h <height>   Height (default: 45)
 *   -r <radius>   FOV radius (default: 24)
 *   -k <walls>    Random walls for fov/walls (default: 10)
 *   -n <runs>     Runs per scenario (default: 200)
 *   -s <seed>     Seed for wall placement (default: 42)
 *   --preview     Print the fov/walls result
 *   --json        Output JSON (for CI)
 */

import { parseBenchConfig, SeededRandom, type BenchConfig } from "@gridsight/contracts";
import { astarPathFourWayGrid, fieldOfView, renderVision, SIMPLE_CHARSET, TileMap } from "../src";

// ─────────────────────────────────────────────────────────────────────────────
// ANSI & Formatting
// ─────────────────────────────────────────────────────────────────────────────
const c = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  white: "\x1b[97m",
};

const fmt = {
  title: (s: string) => `${c.bold}${c.white}${s}${c.reset}`,
  value: (s: string) => `${c.cyan}${s}${c.reset}`,
  label: (s: string) => `${c.dim}${s}${c.reset}`,
  error: (s: string) => `${c.red}${s}${c.reset}`,
  scenario: (s: string) => `${c.magenta}${s}${c.reset}`,
};

// ─────────────────────────────────────────────────────────────────────────────
// CLI
// ─────────────────────────────────────────────────────────────────────────────
const args = process.argv.slice(2);
const getNumber = (flag: string): number | undefined => {
  const i = args.indexOf(flag);
  const raw = i !== -1 ? args[i + 1] : undefined;
  return raw !== undefined ? Number(raw) : undefined;
};
const hasFlag = (flag: string) => args.includes(flag);

const parsed = parseBenchConfig({
  width: getNumber("-w"),
  height: getNumber("-h"),
  radius: getNumber("-r"),
  walls: getNumber("-k"),
  runs: getNumber("-n"),
  seed: getNumber("-s"),
  json: hasFlag("--json"),
});

if (parsed.isErr()) {
  console.error(fmt.error(`[bench] ${parsed.error.message}`));
  process.exit(1);
}

const config: BenchConfig = parsed.value;
const showPreview = hasFlag("--preview") && !config.json;

// ─────────────────────────────────────────────────────────────────────────────
// Scenarios
// ─────────────────────────────────────────────────────────────────────────────
interface Scenario {
  readonly name: string;
  readonly run: () => number;
}

function openMap(): TileMap {
  return new TileMap(config.width, config.height);
}

function centre(): { x: number; y: number } {
  return { x: Math.floor(config.width / 2), y: Math.floor(config.height / 2) };
}

function mapWithRandomWalls(): TileMap {
  const map = openMap();
  const rng = new SeededRandom(config.seed);
  for (let i = 0; i < config.walls; i++) {
    map.setTransparent(rng.range(0, config.width - 1), rng.range(0, config.height - 1), false);
  }
  const { x, y } = centre();
  map.setTransparent(x, y, true);
  return map;
}

/**
 * Two staggered walls leave a gap at opposite ends, forcing a detour.
 */
function walledMap(): TileMap {
  const map = openMap();
  const third = Math.floor(config.width / 3);
  map.buildWall({ x: third, y: 0 }, { x: third, y: config.height - 2 });
  map.buildWall({ x: 2 * third, y: 1 }, { x: 2 * third, y: config.height - 1 });
  return map;
}

function buildScenarios(): Scenario[] {
  const { x, y } = centre();
  const open = openMap();
  const walls = mapWithRandomWalls();
  const walled = walledMap();
  const from = { x: 0, y: 0 };
  const to = { x: config.width - 1, y: config.height - 1 };

  return [
    { name: "fov/open", run: () => fieldOfView(open, x, y, config.radius, true).length },
    { name: "fov/walls", run: () => fieldOfView(walls, x, y, config.radius, true).length },
    { name: "astar/walled", run: () => astarPathFourWayGrid(walled, from, to)?.length ?? 0 },
  ];
}

// ─────────────────────────────────────────────────────────────────────────────
// Benchmark Engine
// ─────────────────────────────────────────────────────────────────────────────
interface BenchResult {
  scenario: string;
  times: number[];
  output: number;
}

function runBenchmark(scenario: Scenario): BenchResult {
  for (let i = 0; i < 5; i++) scenario.run();

  const times: number[] = [];
  let output = 0;
  for (let i = 0; i < config.runs; i++) {
    const start = performance.now();
    output = scenario.run();
    times.push(performance.now() - start);
  }

  return { scenario: scenario.name, times, output };
}

function computeStats(times: readonly number[]) {
  const sorted = [...times].sort((a, b) => a - b);
  const at = (q: number) => sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * q))] ?? 0;
  const avg = times.reduce((a, b) => a + b, 0) / times.length;
  return {
    avg,
    min: at(0),
    max: at(1),
    p50: at(0.5),
    p95: at(0.95),
    opsPerSec: avg > 0 ? 1000 / avg : Infinity,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────
const results = buildScenarios().map(runBenchmark);

if (config.json) {
  console.log(
    JSON.stringify(
      {
        config,
        results: results.map((r) => ({ scenario: r.scenario, output: r.output, ...computeStats(r.times) })),
      },
      null,
      2,
    ),
  );
} else {
  console.log(fmt.title(`\n  Spatial benchmark ${config.width}x${config.height}, radius ${config.radius}, ${config.runs} runs\n`));
  for (const result of results) {
    const stats = computeStats(result.times);
    console.log(
      `  ${fmt.scenario(result.scenario.padEnd(14))}` +
        `${fmt.label("avg")} ${fmt.value(`${stats.avg.toFixed(3)}ms`)}  ` +
        `${fmt.label("p50")} ${fmt.value(`${stats.p50.toFixed(3)}ms`)}  ` +
        `${fmt.label("p95")} ${fmt.value(`${stats.p95.toFixed(3)}ms`)}  ` +
        `${fmt.label("ops/s")} ${fmt.value(stats.opsPerSec.toFixed(0))}  ` +
        `${fmt.label("cells")} ${fmt.value(String(result.output))}`,
    );
  }

  if (showPreview) {
    const map = mapWithRandomWalls();
    const origin = centre();
    const visible = fieldOfView(map, origin.x, origin.y, config.radius, true);
    console.log(`\n${renderVision(map, visible, { origin, charset: SIMPLE_CHARSET })}`);
  }
  console.log();
}
