
export const debugFrame = (message: string, data?: unknown) => {
  console.log(`[FRAME] ${message}`, data ?? '');
};

export const debugInference = (message: string, data?: unknown) => {
  console.log(`[INFERENCE] ${message}`, data ?? '');
};

export const debugSync = (message: string, data?: unknown) => {
  console.log(`[SYNC] ${message}`, data ?? '');
};

export const debugStorage = (message: string, data?: unknown) => {
  console.log(`[STORAGE] ${message}`, data ?? '');
};
