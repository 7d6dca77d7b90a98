/**
 * Residual module: absorbs rounding leftovers on a dedicated account.
 */

export { fillResidualPosting, computeResidual, getPostingWeight } from './fill.js';
export type { ResidualBalancer } from './types.js';
