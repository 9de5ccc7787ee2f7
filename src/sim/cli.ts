#!/usr/bin/env node
import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseInitiativeConfig } from "../config/initiative";
import {
  buildGaugeLine,
  buildPreviewLines,
} from "../game/logging/initiativeLog";
import { validateScenario } from "./scenario";
import { runScenario, type SimulationResult } from "./simulator";

type CliConfig = {
  scenarioPath: string;
  configPath?: string;
  seconds?: number;
  dt?: number;
  seed?: number;
  jitter?: number;
  quiet: boolean;
  jsonPath?: string;
};

const DEFAULT_SCENARIO = fileURLToPath(
  new URL("./scenarios/duel.json", import.meta.url)
);

const helpText = `Usage: npm run sim -- [options]

Options:
  --scenario <path>  Scenario JSON to replay (default scenarios/duel.json)
  --config <path>    Initiative config overrides as JSON
  --seconds <n>      Override the scenario duration
  --dt <n>           Override the frame length in seconds
  --seed <n>         Seed for frame jitter (default 1)
  --jitter <n>       Frame-length spread as a fraction, e.g. 0.25
  --quiet            Only print the summary
  --json <path>      Also emit the result as JSON (use "-" for stdout)
  --help             Show this message
`;

const parseNumber = (flag: string, value: string | undefined): number => {
  const parsed = Number(value);
  if (value === undefined || value === "" || !Number.isFinite(parsed)) {
    throw new Error(`Invalid ${flag} value.`);
  }
  return parsed;
};

const parseArgs = (): CliConfig => {
  const args = process.argv.slice(2);
  const config: CliConfig = {
    scenarioPath: DEFAULT_SCENARIO,
    quiet: false,
  };

  const assign = (flag: string, value: string | undefined) => {
    switch (flag) {
      case "--scenario":
        config.scenarioPath = resolve(process.cwd(), value ?? "");
        return true;
      case "--config":
        config.configPath = resolve(process.cwd(), value ?? "");
        return true;
      case "--seconds":
        config.seconds = parseNumber(flag, value);
        return true;
      case "--dt":
        config.dt = parseNumber(flag, value);
        return true;
      case "--seed":
        config.seed = parseInt(value ?? "", 10);
        return true;
      case "--jitter":
        config.jitter = parseNumber(flag, value);
        return true;
      case "--json":
        config.jsonPath = value;
        return true;
      default:
        return false;
    }
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    switch (arg) {
      case "--help":
      case "-h":
        console.log(helpText);
        process.exit(0);
        break;
      case "--quiet":
        config.quiet = true;
        break;
      default: {
        const eq = arg.indexOf("=");
        if (eq > 0) {
          if (!assign(arg.slice(0, eq), arg.slice(eq + 1))) {
            console.warn(`Unknown option: ${arg}`);
          }
        } else if (!assign(arg, args[i + 1])) {
          console.warn(`Unknown option: ${arg}`);
        } else {
          i += 1;
        }
        break;
      }
    }
  }

  if (config.seconds !== undefined && config.seconds <= 0) {
    throw new Error("Invalid --seconds value.");
  }
  if (config.dt !== undefined && config.dt <= 0) {
    throw new Error("Invalid --dt value.");
  }
  if (config.jitter !== undefined && config.jitter < 0) {
    throw new Error("Invalid --jitter value.");
  }
  return config;
};

const readJson = (path: string): unknown =>
  JSON.parse(readFileSync(path, "utf-8"));

function emitJsonReport(destination: string, payload: SimulationResult) {
  const output = JSON.stringify(payload, null, 2);
  if (destination === "-" || destination === "") {
    console.log("\nJSON report:");
    console.log(output);
    return;
  }
  const resolved = resolve(process.cwd(), destination);
  mkdirSync(dirname(resolved), { recursive: true });
  writeFileSync(resolved, output, "utf-8");
  console.log(`\nJSON report saved to ${resolved}`);
}

const printSummary = (result: SimulationResult) => {
  console.log(`\nScenario: ${result.name}`);
  console.log(`Seed: ${result.seed}`);
  console.log(`Frames: ${result.frames} (${result.elapsed.toFixed(2)}s)`);
  console.log(`Executed: ${result.executed.length}`);
  console.log(`Rejected commits: ${result.rejectedCommits}`);
  console.log(`Reaction windows: ${result.stats.reactionWindows}`);

  Object.entries(result.gauges).forEach(([actorId, gauge]) => {
    console.log(`\n${buildGaugeLine(actorId, gauge)}`);
    const stat = result.stats.actors.find((entry) => entry.actorId === actorId);
    if (stat) {
      console.log(
        `  executed=${stat.executed}, rejected=${stat.rejected}, sandSpent=${stat.sandSpent}, peakMomentum=${stat.peakMomentum}`
      );
    }
    buildPreviewLines(actorId, result.pending[actorId] ?? []).forEach((line) =>
      console.log(`  ${line}`)
    );
  });
};

const main = () => {
  const args = parseArgs();
  const validation = validateScenario(readJson(args.scenarioPath));
  if (!validation.isValid) {
    console.error(`Scenario ${args.scenarioPath} is invalid:`);
    validation.errors.forEach((issue) =>
      console.error(`  - [${issue.code}] ${issue.path}: ${issue.message}`)
    );
    process.exitCode = 1;
    return;
  }

  const config = args.configPath
    ? parseInitiativeConfig(readJson(args.configPath))
    : undefined;

  const result = runScenario(validation.scenario, {
    config,
    seed: args.seed,
    durationSeconds: args.seconds,
    frameSeconds: args.dt,
    jitter: args.jitter,
    log: args.quiet ? undefined : (line) => console.log(line),
  });

  printSummary(result);

  if (args.jsonPath !== undefined) {
    emitJsonReport(args.jsonPath, result);
  }
};

main();
