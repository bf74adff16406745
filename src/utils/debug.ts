export const DEBUG_FLEX = process.env.DEBUG_FLEX === '1' || process.env.DEBUG_FLEX === 'true';
export const DEBUG_FLEX_LEVEL = Number.parseInt(process.env.DEBUG_FLEX_LEVEL || (DEBUG_FLEX ? '1' : '0'), 10) || 0;
export function dbg(...args: unknown[]) {
  if (DEBUG_FLEX_LEVEL >= 1) console.log('[flex]', ...args);
}
export function dbgV(...args: unknown[]) {
  if (DEBUG_FLEX_LEVEL >= 2) console.log('[flex]', ...args);
}
// Dropped input and lost connections; silenced only with a negative level
export function warn(...args: unknown[]) {
  if (DEBUG_FLEX_LEVEL >= 0) console.warn('[flex]', ...args);
}
