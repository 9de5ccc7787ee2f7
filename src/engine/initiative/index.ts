export * from "./types";
export * from "./resourceTimer";
export * from "./reactionWindow";
export * from "./stateMachine";
export * from "./preview";
export * from "./scheduler";
