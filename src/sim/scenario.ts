import type {
  ActionIntent,
  ActionPriority,
  ActorId,
  ActorVitals,
  Alignment,
  ResourceTimerOptions,
} from "../engine/initiative";

export type ScenarioActor = {
  id: ActorId;
  pool?: ResourceTimerOptions;
  vitals?: ActorVitals;
};

export type ScriptedIntent = {
  /** Seconds of scenario time at which the intent is committed. */
  at: number;
  actor: ActorId;
  intent: ActionIntent;
  cost: number;
  priority?: ActionPriority;
  castDuration?: number;
  /** Commit through the reaction gate instead of the normal queue. */
  reaction?: boolean;
};

export type Scenario = {
  name: string;
  durationSeconds: number;
  frameSeconds: number;
  /** Fractional frame-length spread, e.g. 0.25 for +/-25%. */
  jitter?: number;
  actors: ScenarioActor[];
  script: ScriptedIntent[];
};

export type ScenarioIssue = {
  code: string;
  message: string;
  path: string;
};

export type ScenarioValidationResult =
  | { isValid: true; scenario: Scenario; errors: [] }
  | { isValid: false; scenario: null; errors: ScenarioIssue[] };

const PRIORITIES: ActionPriority[] = ["instant", "high", "normal", "low"];
const ALIGNMENTS: Alignment[] = ["order", "chaos", "balance"];
const POOL_KEYS = [
  "capacity",
  "capacityCeiling",
  "startingAmount",
  "momentumCap",
  "momentumStackLimit",
  "resonanceTolerance",
  "favorBound",
  "regenerationRate",
] as const;
const POSITIVE_POOL_KEYS: readonly string[] = ["capacity", "capacityCeiling"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isNonNegativeNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0;

const isPositiveNumber = (value: unknown): value is number =>
  isNonNegativeNumber(value) && value > 0;

const isPriority = (value: unknown): value is ActionPriority =>
  PRIORITIES.some((priority) => priority === value);

const isAlignment = (value: unknown): value is Alignment =>
  ALIGNMENTS.some((alignment) => alignment === value);

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

const parseIntent = (
  raw: unknown,
  path: string,
  errors: ScenarioIssue[]
): ActionIntent | null => {
  if (!isRecord(raw)) {
    errors.push({ code: "intent.notObject", message: "intent must be an object", path });
    return null;
  }
  const targetId = optionalString(raw.targetId);
  switch (raw.kind) {
    case "playCard": {
      if (typeof raw.cardId !== "string") break;
      if (raw.alignment !== undefined && !isAlignment(raw.alignment)) {
        errors.push({
          code: "intent.invalidAlignment",
          message: `unknown alignment "${String(raw.alignment)}"`,
          path: `${path}.alignment`,
        });
        return null;
      }
      return {
        kind: "playCard",
        cardId: raw.cardId,
        targetId,
        alignment: isAlignment(raw.alignment) ? raw.alignment : undefined,
      };
    }
    case "endTurn":
      return { kind: "endTurn" };
    case "reaction":
      if (typeof raw.cardId !== "string") break;
      return { kind: "reaction", cardId: raw.cardId, targetId };
    case "ability":
      if (typeof raw.abilityId !== "string") break;
      return { kind: "ability", abilityId: raw.abilityId, targetId };
    default:
      errors.push({
        code: "intent.unknownKind",
        message: `unknown intent kind "${String(raw.kind)}"`,
        path: `${path}.kind`,
      });
      return null;
  }
  errors.push({
    code: "intent.missingReference",
    message: `${String(raw.kind)} intent is missing its card or ability id`,
    path,
  });
  return null;
};

const parsePool = (
  raw: unknown,
  path: string,
  errors: ScenarioIssue[]
): ResourceTimerOptions | undefined => {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    errors.push({ code: "pool.notObject", message: "pool must be an object", path });
    return undefined;
  }
  const pool: ResourceTimerOptions = {};
  POOL_KEYS.forEach((key) => {
    const value = raw[key];
    if (value === undefined) return;
    if (!isNonNegativeNumber(value)) {
      errors.push({
        code: "pool.invalidValue",
        message: `${key} must be a non-negative number`,
        path: `${path}.${key}`,
      });
      return;
    }
    if (key !== "regenerationRate" && !Number.isInteger(value)) {
      errors.push({
        code: "pool.notInteger",
        message: `${key} must be an integer`,
        path: `${path}.${key}`,
      });
      return;
    }
    if (POSITIVE_POOL_KEYS.includes(key) && value === 0) {
      errors.push({
        code: "pool.invalidValue",
        message: `${key} must be positive`,
        path: `${path}.${key}`,
      });
      return;
    }
    pool[key] = value;
  });
  return pool;
};

const parseVitals = (
  raw: unknown,
  path: string,
  errors: ScenarioIssue[]
): ActorVitals | undefined => {
  if (raw === undefined) return undefined;
  if (
    !isRecord(raw) ||
    !isNonNegativeNumber(raw.healthRatio) ||
    typeof raw.hasBlessing !== "boolean"
  ) {
    errors.push({
      code: "vitals.invalid",
      message: "vitals need a healthRatio number and a hasBlessing flag",
      path,
    });
    return undefined;
  }
  return { healthRatio: raw.healthRatio, hasBlessing: raw.hasBlessing };
};

export const validateScenario = (raw: unknown): ScenarioValidationResult => {
  const errors: ScenarioIssue[] = [];
  if (!isRecord(raw)) {
    return {
      isValid: false,
      scenario: null,
      errors: [{ code: "scenario.notObject", message: "scenario must be an object", path: "$" }],
    };
  }

  if (!isPositiveNumber(raw.durationSeconds)) {
    errors.push({
      code: "scenario.invalidDuration",
      message: "durationSeconds must be a positive number",
      path: "$.durationSeconds",
    });
  }
  if (!isPositiveNumber(raw.frameSeconds)) {
    errors.push({
      code: "scenario.invalidFrame",
      message: "frameSeconds must be a positive number",
      path: "$.frameSeconds",
    });
  }
  if (raw.jitter !== undefined && !isNonNegativeNumber(raw.jitter)) {
    errors.push({
      code: "scenario.invalidJitter",
      message: "jitter must be a non-negative number",
      path: "$.jitter",
    });
  }

  const actors: ScenarioActor[] = [];
  const actorIds = new Set<string>();
  if (!Array.isArray(raw.actors) || raw.actors.length === 0) {
    errors.push({
      code: "scenario.noActors",
      message: "actors must be a non-empty array",
      path: "$.actors",
    });
  } else {
    raw.actors.forEach((entry: unknown, index: number) => {
      const path = `$.actors[${index}]`;
      if (!isRecord(entry) || typeof entry.id !== "string" || !entry.id) {
        errors.push({ code: "actor.missingId", message: "actor needs a string id", path });
        return;
      }
      if (actorIds.has(entry.id)) {
        errors.push({
          code: "actor.duplicateId",
          message: `duplicate actor "${entry.id}"`,
          path,
        });
        return;
      }
      actorIds.add(entry.id);
      actors.push({
        id: entry.id,
        pool: parsePool(entry.pool, `${path}.pool`, errors),
        vitals: parseVitals(entry.vitals, `${path}.vitals`, errors),
      });
    });
  }

  const script: ScriptedIntent[] = [];
  if (!Array.isArray(raw.script)) {
    errors.push({ code: "scenario.noScript", message: "script must be an array", path: "$.script" });
  } else {
    raw.script.forEach((entry: unknown, index: number) => {
      const path = `$.script[${index}]`;
      if (!isRecord(entry)) {
        errors.push({ code: "script.notObject", message: "script entry must be an object", path });
        return;
      }
      if (typeof entry.actor !== "string" || !actorIds.has(entry.actor)) {
        errors.push({
          code: "script.unknownActor",
          message: `unknown actor "${String(entry.actor)}"`,
          path: `${path}.actor`,
        });
        return;
      }
      if (!isNonNegativeNumber(entry.at)) {
        errors.push({ code: "script.invalidTime", message: "at must be >= 0", path: `${path}.at` });
        return;
      }
      if (!Number.isInteger(entry.cost) || !isNonNegativeNumber(entry.cost)) {
        errors.push({
          code: "script.invalidCost",
          message: "cost must be a non-negative integer",
          path: `${path}.cost`,
        });
        return;
      }
      if (entry.priority !== undefined && !isPriority(entry.priority)) {
        errors.push({
          code: "script.invalidPriority",
          message: `unknown priority "${String(entry.priority)}"`,
          path: `${path}.priority`,
        });
        return;
      }
      if (entry.castDuration !== undefined && !isNonNegativeNumber(entry.castDuration)) {
        errors.push({
          code: "script.invalidCastDuration",
          message: "castDuration must be a non-negative number",
          path: `${path}.castDuration`,
        });
        return;
      }
      const intent = parseIntent(entry.intent, `${path}.intent`, errors);
      if (!intent) return;
      if (entry.reaction === true && intent.kind !== "reaction") {
        errors.push({
          code: "script.reactionKind",
          message: "reaction entries must carry a reaction intent",
          path: `${path}.intent.kind`,
        });
        return;
      }
      script.push({
        at: entry.at,
        actor: entry.actor,
        intent,
        cost: entry.cost,
        priority: isPriority(entry.priority) ? entry.priority : undefined,
        castDuration: isNonNegativeNumber(entry.castDuration) ? entry.castDuration : undefined,
        reaction: entry.reaction === true,
      });
    });
  }

  if (
    errors.length > 0 ||
    !isPositiveNumber(raw.durationSeconds) ||
    !isPositiveNumber(raw.frameSeconds)
  ) {
    return { isValid: false, scenario: null, errors };
  }

  return {
    isValid: true,
    errors: [],
    scenario: {
      name: optionalString(raw.name) ?? "scenario",
      durationSeconds: raw.durationSeconds,
      frameSeconds: raw.frameSeconds,
      jitter: isNonNegativeNumber(raw.jitter) ? raw.jitter : undefined,
      actors,
      script: [...script].sort((a, b) => a.at - b.at),
    },
  };
};
