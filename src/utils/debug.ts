const isDebugEnabled = () => {
  const flag = process.env.INITIATIVE_DEBUG;
  return flag !== undefined && flag !== "" && flag !== "0" && flag !== "false";
};

export const initiativeDebugLog = (...args: unknown[]) => {
  if (isDebugEnabled()) {
    // eslint-disable-next-line no-console
    console.debug("[Initiative]", ...args);
  }
};

export type InitiativeLogger = {
  debug: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
};

export const consoleInitiativeLogger: InitiativeLogger = {
  debug: (message, details) => {
    if (details) {
      initiativeDebugLog(message, details);
    } else {
      initiativeDebugLog(message);
    }
  },
  warn: (message, details) => {
    if (details) {
      console.warn(`[Initiative] ${message}`, details);
    } else {
      console.warn(`[Initiative] ${message}`);
    }
  },
};
