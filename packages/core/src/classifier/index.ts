/**
 * Classifier module: posting valuation classes.
 */

export { classifyPosting, classifyPostings, needsCostAsPrice } from './classify.js';
export type { PostingClass, PostingClasses } from './types.js';
