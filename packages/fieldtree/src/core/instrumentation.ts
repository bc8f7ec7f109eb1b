/**
 * Development mode flag, computed once at module load.
 * Gates console diagnostics.
 */
export const __DEV__ = process.env.NODE_ENV === "development";

/** prefixed console warning, development only */
export const devWarn = (message: string): void => {
  if (!__DEV__) return;
  console.warn(`[fieldtree] ${message}`);
};
