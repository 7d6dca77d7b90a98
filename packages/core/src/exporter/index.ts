export { exportDirectives, renderDirectives } from './export.js';
export type { TextSink } from './export.js';
