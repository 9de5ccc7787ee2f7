import type {
  ActionKind,
  ActionPriority,
  ActorId,
  ResonanceLevel,
} from "../engine/initiative/types";

export const STATS_SCHEMA_VERSION = "1.0.0" as const;

export type ActorStat = {
  actorId: ActorId;
  enqueued: number;
  rejected: number;
  executed: number;
  cancelled: number;
  sandSpent: number;
  byKind: Record<ActionKind, number>;
  resonance: Record<ResonanceLevel, number>;
  peakMomentum: number;
  windowsOpened: number;
};

export type ExecutionStat = {
  id: number;
  actorId: ActorId;
  kind: ActionKind;
  priority: ActionPriority;
  cost: number;
  queuedAt: number;
  castStartedAt: number;
  executedAt: number;
  /** Seconds spent waiting for sand or a closed window before the spend. */
  waitSeconds: number;
};

export type StatsSessionInit = {
  sessionId?: string;
  label?: string;
  seed?: number;
};

export type SessionStat = {
  id: string;
  schemaVersion: typeof STATS_SCHEMA_VERSION;
  label?: string;
  seed?: number;
  endedAt?: number;
};

export type StatsSnapshot = {
  session: SessionStat | null;
  actors: ActorStat[];
  executions: ExecutionStat[];
  reactionWindows: number;
};
