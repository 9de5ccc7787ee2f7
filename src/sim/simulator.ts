import type { InitiativeConfig } from "../config/initiative";
import {
  createActionScheduler,
  TIME_EPSILON,
  type ActorId,
  type ExecutedAction,
  type PreviewEntry,
  type ResourceGauge,
} from "../engine/initiative";
import { jitterFrame, makeRng, normalizeSeed } from "../engine/rng";
import { createCombatSession } from "../game/combat/session";
import { InitiativeStatsTracker } from "../stats/tracker";
import type { StatsSnapshot } from "../stats/types";
import type { InitiativeLogger } from "../utils/debug";
import type { Scenario, ScriptedIntent } from "./scenario";

export const DEFAULT_SIM_SEED = 1;
const MAX_JITTER = 0.9;

export type SimulationOptions = {
  config?: Partial<InitiativeConfig>;
  seed?: number;
  /** Overrides the scenario's own duration. */
  durationSeconds?: number;
  /** Overrides the scenario's own frame length. */
  frameSeconds?: number;
  jitter?: number;
  log?: (line: string) => void;
  logger?: InitiativeLogger;
};

export type SimulationResult = {
  name: string;
  seed: number;
  frames: number;
  elapsed: number;
  executed: ExecutedAction[];
  rejectedCommits: number;
  gauges: Record<ActorId, ResourceGauge>;
  pending: Record<ActorId, PreviewEntry[]>;
  stats: StatsSnapshot;
};

/**
 * Replays a scripted scenario through a combat session at fixed (or jittered)
 * frame lengths. Script entries are committed on the first frame boundary at
 * or after their timestamp.
 */
export function runScenario(
  scenario: Scenario,
  options: SimulationOptions = {}
): SimulationResult {
  const seed = normalizeSeed(options.seed, DEFAULT_SIM_SEED);
  const duration = options.durationSeconds ?? scenario.durationSeconds;
  const frameSeconds = options.frameSeconds ?? scenario.frameSeconds;
  const jitter = Math.min(options.jitter ?? scenario.jitter ?? 0, MAX_JITTER);
  const log = options.log ?? (() => {});
  const rng = makeRng(seed);

  const scheduler = createActionScheduler({
    config: options.config,
    logger: options.logger,
  });
  const stats = new InitiativeStatsTracker();
  stats.beginSession({ label: scenario.name, seed });

  const executed: ExecutedAction[] = [];
  const session = createCombatSession({
    scheduler,
    resolver: { resolve: (action) => executed.push(action) },
    log,
    stats,
  });

  scenario.actors.forEach((actor) => {
    session.register(actor.id, actor.pool);
    if (actor.vitals) {
      scheduler.updateVitals(actor.id, actor.vitals);
    }
  });

  let cursor = 0;
  let rejectedCommits = 0;
  const commit = (entry: ScriptedIntent) => {
    const { intent } = entry;
    const accepted =
      entry.reaction && intent.kind === "reaction"
        ? session.react(entry.actor, {
            intent,
            cost: entry.cost,
            castDuration: entry.castDuration,
          })
        : session.commit(entry.actor, {
            intent,
            cost: entry.cost,
            priority: entry.priority,
            castDuration: entry.castDuration,
          });
    if (!accepted) rejectedCommits += 1;
  };
  const commitDue = () => {
    while (
      cursor < scenario.script.length &&
      scenario.script[cursor].at <= scheduler.now() + TIME_EPSILON
    ) {
      commit(scenario.script[cursor]);
      cursor += 1;
    }
  };

  let frames = 0;
  commitDue();
  while (scheduler.now() < duration - TIME_EPSILON) {
    const remaining = duration - scheduler.now();
    const frame = Math.min(remaining, jitterFrame(rng, frameSeconds, jitter));
    session.advance(frame);
    frames += 1;
    commitDue();
  }

  const gauges: Record<ActorId, ResourceGauge> = {};
  const pending: Record<ActorId, PreviewEntry[]> = {};
  scheduler.actorIds().forEach((actorId) => {
    gauges[actorId] = scheduler.getPool(actorId).snapshot();
    pending[actorId] = scheduler.previewState(actorId);
  });

  return {
    name: scenario.name,
    seed,
    frames,
    elapsed: scheduler.now(),
    executed,
    rejectedCommits,
    gauges,
    pending,
    stats: stats.finalizeSession(scheduler.now()) ?? stats.getSnapshot(),
  };
}
