import type { ActorId, ExecutedAction } from "../engine/initiative/types";
import {
  STATS_SCHEMA_VERSION,
  type ActorStat,
  type ExecutionStat,
  type SessionStat,
  type StatsSessionInit,
  type StatsSnapshot,
} from "./types";

const createActorStat = (actorId: ActorId): ActorStat => ({
  actorId,
  enqueued: 0,
  rejected: 0,
  executed: 0,
  cancelled: 0,
  sandSpent: 0,
  byKind: { playCard: 0, endTurn: 0, reaction: 0, ability: 0 },
  resonance: { perfect: 0, minor: 0, none: 0 },
  peakMomentum: 0,
  windowsOpened: 0,
});

const cloneActor = (stat: ActorStat): ActorStat => ({
  ...stat,
  byKind: { ...stat.byKind },
  resonance: { ...stat.resonance },
});

export class InitiativeStatsTracker {
  private session: SessionStat | null = null;
  private actors = new Map<ActorId, ActorStat>();
  private executions: ExecutionStat[] = [];
  private reactionWindows = 0;
  private sessionCount = 0;

  beginSession(meta: StatsSessionInit = {}) {
    this.sessionCount += 1;
    this.session = {
      id: meta.sessionId ?? `session_${this.sessionCount}`,
      schemaVersion: STATS_SCHEMA_VERSION,
      label: meta.label,
      seed: meta.seed,
    };
    this.actors = new Map();
    this.executions = [];
    this.reactionWindows = 0;
  }

  private actor(actorId: ActorId): ActorStat {
    const existing = this.actors.get(actorId);
    if (existing) return existing;
    const created = createActorStat(actorId);
    this.actors.set(actorId, created);
    return created;
  }

  recordEnqueue(actorId: ActorId, accepted: boolean) {
    if (!this.session) return;
    const stat = this.actor(actorId);
    if (accepted) {
      stat.enqueued += 1;
    } else {
      stat.rejected += 1;
    }
  }

  recordCancel(actorId: ActorId, count: number) {
    if (!this.session || count <= 0) return;
    this.actor(actorId).cancelled += count;
  }

  recordExecution(action: ExecutedAction) {
    if (!this.session) return;
    const stat = this.actor(action.actorId);
    stat.executed += 1;
    stat.sandSpent += action.cost;
    stat.byKind[action.intent.kind] += 1;
    stat.resonance[action.cast.resonance] += 1;
    stat.peakMomentum = Math.max(stat.peakMomentum, action.cast.momentumStacks);
    if (action.openedReactionWindow) {
      stat.windowsOpened += 1;
      this.reactionWindows += 1;
    }
    this.executions = [
      ...this.executions,
      {
        id: action.id,
        actorId: action.actorId,
        kind: action.intent.kind,
        priority: action.priority,
        cost: action.cost,
        queuedAt: action.queuedAt,
        castStartedAt: action.castStartedAt,
        executedAt: action.executedAt,
        waitSeconds: Math.max(0, action.castStartedAt - action.queuedAt),
      },
    ];
  }

  finalizeSession(endedAt: number): StatsSnapshot | null {
    if (!this.session) return null;
    if (this.session.endedAt === undefined) {
      this.session = { ...this.session, endedAt };
    }
    return this.getSnapshot();
  }

  getSnapshot(): StatsSnapshot {
    return {
      session: this.session ? { ...this.session } : null,
      actors: Array.from(this.actors.values()).map(cloneActor),
      executions: this.executions.map((entry) => ({ ...entry })),
      reactionWindows: this.reactionWindows,
    };
  }
}
