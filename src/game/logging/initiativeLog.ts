import type {
  ActionIntent,
  ActionRequest,
  ActorId,
  ExecutedAction,
  PreviewEntry,
  ResourceGauge,
} from "../../engine/initiative";

const actionTag = (value: string) => `<<action:${value}>>`;
const resourceTag = (value: string) => `<<resource:${value}>>`;

export const indentLog = (line: string) => ` > ${line}`;

export const formatSeconds = (value: number) =>
  Number.isFinite(value) ? `${value.toFixed(2)}s` : "never";

export const formatClock = (value: number) => `[t=${formatSeconds(value)}]`;

export const describeIntent = (intent: ActionIntent): string => {
  switch (intent.kind) {
    case "playCard":
      return `card:${intent.cardId}`;
    case "endTurn":
      return "end-turn";
    case "reaction":
      return `reaction:${intent.cardId}`;
    case "ability":
      return `ability:${intent.abilityId}`;
  }
};

const targetOf = (intent: ActionIntent) =>
  intent.kind === "endTurn" ? undefined : intent.targetId;

export const buildQueueLine = (
  clock: number,
  actorId: ActorId,
  request: ActionRequest,
  accepted: boolean
) => {
  const tag = actionTag(describeIntent(request.intent));
  const priority = request.priority ?? "normal";
  if (!accepted) {
    return `${formatClock(clock)} ${actorId} cannot commit ${tag} (cost ${request.cost}).`;
  }
  return `${formatClock(clock)} ${actorId} queues ${tag} (cost ${request.cost}, ${priority}).`;
};

export const buildExecutionLines = (action: ExecutedAction): string[] => {
  const lines: string[] = [];
  const tag = actionTag(describeIntent(action.intent));
  const target = targetOf(action.intent);
  const suffix = target ? ` -> ${target}` : "";
  lines.push(
    `${formatClock(action.executedAt)} ${action.actorId} executes ${tag}${suffix}.`
  );

  const details: string[] = [`spent ${action.cost}`];
  if (action.castDuration > 0 && action.priority !== "instant") {
    details.push(`cast ${formatSeconds(action.castDuration)}`);
  }
  if (action.cast.resonance !== "none") {
    details.push(`${action.cast.resonance} resonance`);
  }
  if (action.cast.momentumStacks > 0) {
    details.push(`momentum x${action.cast.momentumStacks}`);
  }
  lines.push(indentLog(`${details.join(", ")}.`));

  if (action.openedReactionWindow) {
    lines.push(indentLog("Reaction window opens."));
  }
  return lines;
};

export const buildWindowClosedLine = (clock: number) =>
  `${formatClock(clock)} Reaction window closes.`;

export const buildGaugeLine = (actorId: ActorId, gauge: ResourceGauge) =>
  `${actorId} ${resourceTag("sand")} ${gauge.currentAmount}/${gauge.capacity} (next in ${formatSeconds(
    gauge.timeUntilNextUnit
  )}).`;

export const buildPreviewLines = (
  actorId: ActorId,
  entries: PreviewEntry[]
): string[] => {
  if (entries.length === 0) {
    return [`${actorId} queue is empty.`];
  }
  return [
    `${actorId} queue:`,
    ...entries.map((entry) =>
      indentLog(
        `#${entry.id} ${entry.kind} ${entry.status} (cost ${entry.cost}, ${formatSeconds(
          entry.timeRemaining
        )} left)${entry.blockedByReaction ? " [reaction]" : ""}`
      )
    ),
  ];
};
