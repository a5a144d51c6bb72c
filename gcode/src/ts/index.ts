/**
 * @grbl-node/gcode
 *
 * G-code lexer, modal parser and segment preprocessor for GRBL.
 * Turns program text into motion segments and renders them back into
 * command lines ready to be streamed.
 */

// Export all types (re-exported from @grbl-node/types)
export * from "@grbl-node/types";

export { GCodeError, GCodeSyntaxError, GCodeDomainError } from "./errors";
export { tokenizeLine } from "./lexer";
export {
  GCodeParser,
  ParsedLine,
  parseTokens,
  createParserState,
  cloneParserState,
  modalGroupOf,
} from "./parser";
export { generateSegment, resolveTarget } from "./segments";
export {
  PlaneAxes,
  planeAxes,
  centerFromOffsets,
  centerFromRadius,
  arcSweep,
  arcChordCount,
  interpolateArc,
} from "./arc";
export { MM_PER_INCH, unitFactor, convertSegment } from "./units";
export {
  Preprocessor,
  PreprocessorOptions,
  DEFAULT_ARC_TOLERANCE,
  POINT_TOLERANCE,
  expandArc,
  expandArcs,
  convertUnits,
  optimizeRapids,
  isArc,
  samePoint,
} from "./preprocessor";
export {
  segmentToGCode,
  programToGCode,
  segmentLength,
  estimateDuration,
  formatNumber,
  formatCompact,
} from "./emitter";
export {
  parseProgram,
  parseGCode,
  computeExtents,
  DEFAULT_PROGRESS_UPDATES,
} from "./program";
