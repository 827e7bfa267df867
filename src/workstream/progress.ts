/**
 * Step progress rendering
 */

export const DONE_MARKER = "[x]";
export const PENDING_MARKER = "[ ]";
export const STEP_SEPARATOR = " > ";

/**
 * Display name of a step: everything after the first `.`
 */
export function stepDisplayName(step: string): string {
  const dot = step.indexOf(".");
  return dot === -1 ? step : step.slice(dot + 1);
}

/**
 * Render steps as `[x]idea > [x]prd > [ ]prd-plus`.
 * Steps at or before `currentIndex` are done.
 */
export function renderStepBar(steps: readonly string[], currentIndex: number): string {
  return steps
    .map((step, i) => `${i <= currentIndex ? DONE_MARKER : PENDING_MARKER}${stepDisplayName(step)}`)
    .join(STEP_SEPARATOR);
}
