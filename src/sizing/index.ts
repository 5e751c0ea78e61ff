/**
 * Copy sizing.
 *
 * Scales a followed wallet's fills to this session's risk budget.
 */

export type { CopySizingResult, FillSizer } from "./types.js";
export { type CopySizerConfig, CopySizer } from "./copy-sizer.js";
