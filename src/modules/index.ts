/**
 * Pipeline modules export
 */

export { loadLut } from "./lut";
export { mergeLutData } from "./merger";
export type { MergeOutcome, MergeResult } from "./merger";
export { detectRowType } from "./detector";
export { extractElements } from "./extractor";
export type { ExtractionResult } from "./extractor";
export { assembleRecord, serializeDocument } from "./assembler";
export { stats } from "./stats";
