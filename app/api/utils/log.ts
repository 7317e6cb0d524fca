type LogPayload = Record<string, unknown>;

export const logStart = (scope: string, requestId: string, payload: LogPayload = {}) => {
  console.info(`[${scope}] start`, { requestId, ...payload });
};

export const logSuccess = (scope: string, requestId: string, payload: LogPayload = {}) => {
  console.info(`[${scope}] success`, { requestId, ...payload });
};

export const logFailure = (scope: string, requestId: string, error: unknown, fallbackMessage: string) => {
  const payload =
    error instanceof Error
      ? { message: error.message, stack: error.stack }
      : { message: fallbackMessage, stack: undefined };
  console.error(`[${scope}] fail`, { requestId, ...payload });
};
