export type ActorId = string;
export type ActionId = number;

export type ActionPriority = "instant" | "high" | "normal" | "low";

export const PRIORITY_RANK: Record<ActionPriority, number> = {
  instant: 0,
  high: 1,
  normal: 2,
  low: 3,
};

export type Alignment = "order" | "chaos" | "balance";

export type PlayCardIntent = {
  kind: "playCard";
  cardId: string;
  targetId?: string;
  alignment?: Alignment;
};

export type EndTurnIntent = { kind: "endTurn" };

export type ReactionIntent = {
  kind: "reaction";
  cardId: string;
  targetId?: string;
  /** Id of the action whose execution opened the window being answered. */
  respondsTo?: ActionId;
};

export type AbilityIntent = {
  kind: "ability";
  abilityId: string;
  targetId?: string;
};

export type ActionIntent =
  | PlayCardIntent
  | EndTurnIntent
  | ReactionIntent
  | AbilityIntent;

export type ActionKind = ActionIntent["kind"];

export type ActionRequest = {
  intent: ActionIntent;
  cost: number;
  priority?: ActionPriority;
  castDuration?: number;
};

export type ReactionRequest = {
  intent: ReactionIntent;
  cost: number;
  castDuration?: number;
};

export type ResonanceLevel = "perfect" | "minor" | "none";

/** What the owner's pool looked like at the moment the cost was spent. */
export type CastContext = {
  resonance: ResonanceLevel;
  momentumStacks: number;
  momentumReduction: number;
};

export type ActionState =
  | { phase: "queued" }
  | { phase: "casting"; castStartedAt: number; cast: CastContext };

export type ActionPhase = ActionState["phase"];
export type CastingState = Extract<ActionState, { phase: "casting" }>;

export interface PendingAction {
  readonly id: ActionId;
  readonly actorId: ActorId;
  readonly intent: ActionIntent;
  readonly priority: ActionPriority;
  readonly cost: number;
  readonly castDuration: number;
  readonly queuedAt: number;
  state: ActionState;
}

export type ExecutedAction = Readonly<
  Omit<PendingAction, "state"> & {
    castStartedAt: number;
    cast: CastContext;
    executedAt: number;
    openedReactionWindow: boolean;
  }
>;

export type PreviewStatus =
  | "waitingForSand"
  | "readyToCast"
  | "casting"
  | "ready";

export type PreviewEntry = {
  id: ActionId;
  kind: ActionKind;
  priority: ActionPriority;
  cost: number;
  castDuration: number;
  status: PreviewStatus;
  /** Seconds until execution is possible; Infinity when the pool never refills. */
  timeRemaining: number;
  blockedByReaction: boolean;
};

export type ActorVitals = {
  healthRatio: number;
  hasBlessing: boolean;
};

export type ResourceGauge = {
  currentAmount: number;
  capacity: number;
  regenerationRate: number;
  timeUntilNextUnit: number;
  momentumStacks: number;
  favorScore: number;
  paused: boolean;
};

export type ReactionWindowView = {
  isOpen: () => boolean;
  remaining: () => number;
  triggeringAction: () => ExecutedAction | null;
};

/** Tolerance for floating-point drift in virtual-time comparisons. */
export const TIME_EPSILON = 1e-9;
