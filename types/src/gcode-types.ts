/**
 * G-Code Types
 *
 * Tokens, modal parser state, parsed lines and motion segments for the GRBL
 * subset of RS274/NGC.
 */

// ============================================================================
// Enums
// ============================================================================

/**
 * Kinds of token produced by the lexer.
 */
export enum TokenType {
  COMMAND = 1,
  PARAMETER = 2,
  COMMENT = 3,
  LINE_NUMBER = 4,
  CHECKSUM = 5,
}

/**
 * Length units used in the G-code program.
 */
export enum Units {
  MM = 1,
  INCHES = 2,
}

/**
 * G90/G91 distance mode.
 */
export enum PositioningMode {
  ABSOLUTE = 1,
  RELATIVE = 2,
}

/**
 * Plane selection for arcs (G17/G18/G19).
 */
export enum Plane {
  XY = 1,
  XZ = 2,
  YZ = 3,
}

/**
 * G93/G94 feed rate mode.
 */
export enum FeedRateMode {
  UNITS_PER_MINUTE = 1,
  INVERSE_TIME = 2,
}

export enum SpindleState {
  OFF = 0,
  CW = 1,
  CCW = 2,
}

export enum CoolantState {
  OFF = 0,
  MIST = 1,
  FLOOD = 2,
  BOTH = 3,
}

/**
 * Sticky motion modes of modal group 1.
 */
export enum MotionMode {
  RAPID = 1,
  LINEAR = 2,
  ARC_CW = 3,
  ARC_CCW = 4,
  PROBE = 5,
}

/**
 * RS274/NGC modal groups, numbered as in the standard.
 */
export enum ModalGroup {
  NON_MODAL = 0,
  MOTION = 1,
  PLANE = 2,
  DISTANCE = 3,
  PROGRAM_FLOW = 4,
  FEED_RATE_MODE = 5,
  UNITS = 6,
  CUTTER_COMPENSATION = 7,
  TOOL_LENGTH = 8,
  TOOL = 9,
  SPINDLE = 10,
  COOLANT = 11,
  COORDINATE_SYSTEM = 12,
  PATH_CONTROL = 13,
  NONE = 99,
}

/**
 * What a parsed line does as a whole.
 */
export enum CommandType {
  MOTION = 1,
  MODE_CHANGE = 2,
  NON_MODAL = 3,
  SPINDLE = 4,
  COOLANT = 5,
  TOOL_CHANGE = 6,
  PROGRAM_FLOW = 7,
  PARAMETERS_ONLY = 8,
  EMPTY = 9,
}

export enum SegmentType {
  RAPID = 1,
  LINEAR = 2,
  ARC_CW = 3,
  ARC_CCW = 4,
}

export enum ArcDirection {
  CW = 1,
  CCW = 2,
}

// ============================================================================
// Basic Types
// ============================================================================

export interface Point3D {
  x: number;
  y: number;
  z: number;
}

export type Axis = "x" | "y" | "z";

// ============================================================================
// Tokens
// ============================================================================

/**
 * G, M or T word. The code keeps its fractional part (G38.2, G91.1).
 */
export interface CommandToken {
  type: TokenType.COMMAND;
  letter: "G" | "M" | "T";
  code: number;
  column: number;
}

export interface ParameterToken {
  type: TokenType.PARAMETER;
  letter: string;
  value: number;
  column: number;
}

export interface CommentToken {
  type: TokenType.COMMENT;
  text: string;
  column: number;
}

export interface LineNumberToken {
  type: TokenType.LINE_NUMBER;
  value: number;
  column: number;
}

export interface ChecksumToken {
  type: TokenType.CHECKSUM;
  value: number;
  column: number;
}

export type Token =
  | CommandToken
  | ParameterToken
  | CommentToken
  | LineNumberToken
  | ChecksumToken;

// ============================================================================
// Parser
// ============================================================================

/**
 * Modal state carried from line to line while one program is parsed.
 */
export interface ParserState {
  positioningMode: PositioningMode;
  units: Units;
  plane: Plane;
  feedRateMode: FeedRateMode;
  /** Active work coordinate system, 1 = G54 ... 6 = G59 */
  coordinateSystem: number;
  /** Sticky motion mode, null after G80 */
  motionMode: MotionMode | null;
  /** Tool position in program coordinates and current units */
  position: Point3D;
  feedRate: number;
  spindleSpeed: number;
  spindleState: SpindleState;
  coolantState: CoolantState;
  tool: number;
}

/**
 * One line's resolved intent after modal resolution.
 */
export interface ParsedCommand {
  /** 1-based line of the program text */
  readonly sourceLine: number;
  /** N word, if present */
  readonly lineNumber: number | null;
  readonly modalGroup: ModalGroup;
  readonly commandType: CommandType;
  readonly gCodes: readonly number[];
  readonly mCodes: readonly number[];
  /** Motion that applies to this line, explicit or carried over */
  readonly motion: MotionMode | null;
  /** Parameter words keyed by upper-case letter */
  readonly parameters: Readonly<Record<string, number>>;
  readonly comment: string | null;
  /** The line's words re-joined, comments and checksum removed */
  readonly text: string;
}

// ============================================================================
// Segments
// ============================================================================

interface SegmentBase {
  start: Point3D;
  end: Point3D;
  /** Units per minute, or 1/minutes under inverse time; 0 for rapids */
  feedRate: number;
  /** Feed rate given in G93 inverse time mode */
  inverseTime: boolean;
  spindleSpeed: number;
  units: Units;
  /** 1-based line of the program text that produced the segment */
  sourceLine: number;
  lineNumber: number | null;
}

export interface RapidSegment extends SegmentBase {
  type: SegmentType.RAPID;
}

export interface LinearSegment extends SegmentBase {
  type: SegmentType.LINEAR;
}

/**
 * G2/G3 arc. Expanded into linear chords by the preprocessor.
 */
export interface ArcSegment extends SegmentBase {
  type: SegmentType.ARC_CW | SegmentType.ARC_CCW;
  /** Absolute arc center; the coordinate along the plane normal equals start's */
  center: Point3D;
  radius: number;
  plane: Plane;
  direction: ArcDirection;
  /** Signed angular travel in radians, negative for clockwise */
  sweep: number;
}

export type Segment = RapidSegment | LinearSegment | ArcSegment;

// ============================================================================
// Program Results
// ============================================================================

/**
 * Bounding box of every segment endpoint.
 */
export interface Extents {
  min: Point3D;
  max: Point3D;
}

/**
 * A line that failed to lex or parse. Parsing carries on past it.
 */
export interface GCodeLineError {
  sourceLine: number;
  /** 1-based column for syntax errors */
  column: number | null;
  message: string;
  text: string;
}

export interface ProgramParseResult {
  commands: ParsedCommand[];
  segments: Segment[];
  errors: GCodeLineError[];
  /** null when the program has no motion */
  extents: Extents | null;
  /** Modal state after the last line */
  state: ParserState;
}

/**
 * Progress information reported while a program file is parsed.
 */
export interface ParseProgress {
  bytesRead: number;
  totalBytes: number;
  /** Percentage complete (0-100) */
  percent: number;
  segmentCount: number;
}

export interface ParseOptions {
  /** Starting tool position, defaults to the origin */
  initialPosition?: Point3D;
  /** Progress callback, called periodically during parsing */
  onProgress?: (progress: ParseProgress) => void;
  /**
   * Target number of progress updates. Set to 0 to disable progress callbacks.
   * @default 40
   */
  progressUpdates?: number;
}
