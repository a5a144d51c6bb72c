/**
 * G-Code Parser
 *
 * Resolves one tokenized line against the modal state left by the lines
 * before it. A line is applied atomically: when it fails, the state is left as
 * it was, which is how GRBL discards a rejected block.
 */

import {
  CommandType,
  CoolantState,
  FeedRateMode,
  ModalGroup,
  MotionMode,
  ParsedCommand,
  ParserState,
  Plane,
  Point3D,
  PositioningMode,
  Segment,
  SpindleState,
  Token,
  TokenType,
  Units,
} from "@grbl-node/types";
import { GCodeDomainError, GCodeSyntaxError } from "./errors";
import { tokenizeLine } from "./lexer";
import { generateSegment } from "./segments";
import { MM_PER_INCH } from "./units";

/** Parameter words GRBL accepts */
const SUPPORTED_PARAMETERS = new Set([
  "X",
  "Y",
  "Z",
  "I",
  "J",
  "K",
  "R",
  "F",
  "S",
  "P",
  "L",
]);

const AXIS_LETTERS = ["X", "Y", "Z"] as const;

/** Non-modal commands that take the line's axis words for themselves */
const AXIS_CONSUMING_NON_MODAL = new Set([10, 28, 30, 92]);

const G_MOTION: ReadonlyMap<number, MotionMode> = new Map([
  [0, MotionMode.RAPID],
  [1, MotionMode.LINEAR],
  [2, MotionMode.ARC_CW],
  [3, MotionMode.ARC_CCW],
  [38.2, MotionMode.PROBE],
  [38.3, MotionMode.PROBE],
  [38.4, MotionMode.PROBE],
  [38.5, MotionMode.PROBE],
]);

/**
 * Modal group of a G or M code, or undefined if GRBL does not support it.
 */
export function modalGroupOf(
  letter: "G" | "M",
  code: number
): ModalGroup | undefined {
  if (letter === "G") {
    if (G_MOTION.has(code) || code === 80) return ModalGroup.MOTION;
    switch (code) {
      case 4:
      case 10:
      case 28:
      case 28.1:
      case 30:
      case 30.1:
      case 53:
      case 92:
      case 92.1:
        return ModalGroup.NON_MODAL;
      case 17:
      case 18:
      case 19:
        return ModalGroup.PLANE;
      case 90:
      case 91:
      case 91.1:
        return ModalGroup.DISTANCE;
      case 93:
      case 94:
        return ModalGroup.FEED_RATE_MODE;
      case 20:
      case 21:
        return ModalGroup.UNITS;
      case 40:
        return ModalGroup.CUTTER_COMPENSATION;
      case 43.1:
      case 49:
        return ModalGroup.TOOL_LENGTH;
      case 54:
      case 55:
      case 56:
      case 57:
      case 58:
      case 59:
        return ModalGroup.COORDINATE_SYSTEM;
      case 61:
        return ModalGroup.PATH_CONTROL;
      default:
        return undefined;
    }
  }

  switch (code) {
    case 0:
    case 1:
    case 2:
    case 30:
      return ModalGroup.PROGRAM_FLOW;
    case 3:
    case 4:
    case 5:
      return ModalGroup.SPINDLE;
    case 7:
    case 8:
    case 9:
      return ModalGroup.COOLANT;
    case 56:
      return ModalGroup.NON_MODAL;
    default:
      return undefined;
  }
}

/**
 * Power-on modal state of GRBL: G0 G54 G17 G21 G90 G94 M5 M9 T0 F0 S0.
 */
export function createParserState(position?: Point3D): ParserState {
  return {
    positioningMode: PositioningMode.ABSOLUTE,
    units: Units.MM,
    plane: Plane.XY,
    feedRateMode: FeedRateMode.UNITS_PER_MINUTE,
    coordinateSystem: 1,
    motionMode: MotionMode.RAPID,
    position: position ? { ...position } : { x: 0, y: 0, z: 0 },
    feedRate: 0,
    spindleSpeed: 0,
    spindleState: SpindleState.OFF,
    coolantState: CoolantState.OFF,
    tool: 0,
  };
}

export function cloneParserState(state: ParserState): ParserState {
  return { ...state, position: { ...state.position } };
}

/**
 * Resolves a line's tokens and applies its modal changes to `state`.
 *
 * Position is left to the segment generator. On error `state` may be
 * partially updated; {@link GCodeParser} works on a copy for that reason.
 *
 * @throws GCodeDomainError for words GRBL does not support or cannot combine
 */
export function parseTokens(
  tokens: readonly Token[],
  state: ParserState,
  sourceLine = 0
): ParsedCommand {
  const gCodes: number[] = [];
  const mCodes: number[] = [];
  const parameters: Record<string, number> = {};
  const comments: string[] = [];
  const words: string[] = [];
  let lineNumber: number | null = null;
  let tool: number | null = null;

  const fail: (message: string) => never = (message) => {
    throw new GCodeDomainError(message, sourceLine);
  };

  for (const token of tokens) {
    switch (token.type) {
      case TokenType.COMMAND:
        words.push(`${token.letter}${token.code}`);
        if (token.letter === "G") gCodes.push(token.code);
        else if (token.letter === "M") mCodes.push(token.code);
        else if (tool !== null) fail("Repeated T word");
        else tool = token.code;
        break;
      case TokenType.PARAMETER:
        if (!SUPPORTED_PARAMETERS.has(token.letter)) {
          fail(`Unsupported word '${token.letter}'`);
        }
        if (token.letter in parameters) {
          fail(`Repeated ${token.letter} word`);
        }
        parameters[token.letter] = token.value;
        words.push(`${token.letter}${token.value}`);
        break;
      case TokenType.LINE_NUMBER:
        lineNumber = token.value;
        words.unshift(`N${token.value}`);
        break;
      case TokenType.COMMENT:
        comments.push(token.text);
        break;
      case TokenType.CHECKSUM:
        break;
    }
  }

  // Group validation: at most one word per modal group, coolant excepted (M7 M8 may pair)
  const groupsSeen = new Set<ModalGroup>();
  let firstGroup: ModalGroup | null = null;
  const checkGroup = (letter: "G" | "M", code: number): ModalGroup => {
    const group = modalGroupOf(letter, code);
    if (group === undefined) {
      return fail(`Unsupported command ${letter}${code}`);
    }
    if (group !== ModalGroup.COOLANT && group !== ModalGroup.NON_MODAL) {
      if (groupsSeen.has(group)) {
        fail(`Modal group violation: more than one ${ModalGroup[group]} word`);
      }
      groupsSeen.add(group);
    }
    firstGroup ??= group;
    return group;
  };

  let motion: MotionMode | null = null;
  let motionCancelled = false;
  let nonModal: number | null = null;
  let modeChanged = false;

  for (const code of gCodes) {
    const group = checkGroup("G", code);
    if (group === ModalGroup.MOTION) {
      const mode = G_MOTION.get(code);
      if (mode === undefined) motionCancelled = true;
      else motion = mode;
    } else if (group === ModalGroup.NON_MODAL) {
      // G53 only modifies the motion on its line
      if (code !== 53) {
        if (nonModal !== null) fail("More than one non-modal command");
        nonModal = code;
      }
    } else {
      modeChanged = true;
    }
  }

  let programFlow: number | null = null;
  let spindle: SpindleState | null = null;
  const coolantCodes: number[] = [];
  for (const code of mCodes) {
    const group = checkGroup("M", code);
    if (group === ModalGroup.PROGRAM_FLOW) programFlow = code;
    else if (group === ModalGroup.SPINDLE) {
      spindle =
        code === 3
          ? SpindleState.CW
          : code === 4
          ? SpindleState.CCW
          : SpindleState.OFF;
    } else if (group === ModalGroup.COOLANT) coolantCodes.push(code);
  }

  const hasAxisWords = AXIS_LETTERS.some((axis) => axis in parameters);
  const axesConsumed =
    nonModal !== null && AXIS_CONSUMING_NON_MODAL.has(nonModal);

  if (motion !== null && axesConsumed && hasAxisWords) {
    fail(`G${nonModal} and a motion command both need the axis words`);
  }
  if (
    (motion === MotionMode.ARC_CW || motion === MotionMode.ARC_CCW) &&
    !hasAxisWords
  ) {
    fail("Arc command without axis words");
  }

  // Apply in GRBL's order of execution
  for (const code of gCodes) {
    switch (code) {
      case 93:
        state.feedRateMode = FeedRateMode.INVERSE_TIME;
        break;
      case 94:
        state.feedRateMode = FeedRateMode.UNITS_PER_MINUTE;
        break;
    }
  }
  if ("F" in parameters) {
    if (parameters.F < 0) fail("Negative feed rate");
    state.feedRate = parameters.F;
  }
  if ("S" in parameters) {
    if (parameters.S < 0) fail("Negative spindle speed");
    state.spindleSpeed = parameters.S;
  }
  if (tool !== null) state.tool = tool;
  if (spindle !== null) state.spindleState = spindle;
  for (const code of coolantCodes) {
    state.coolantState = applyCoolant(state.coolantState, code);
  }
  for (const code of gCodes) {
    switch (code) {
      case 17:
        state.plane = Plane.XY;
        break;
      case 18:
        state.plane = Plane.XZ;
        break;
      case 19:
        state.plane = Plane.YZ;
        break;
      case 20:
        setUnits(state, Units.INCHES);
        break;
      case 21:
        setUnits(state, Units.MM);
        break;
      case 90:
        state.positioningMode = PositioningMode.ABSOLUTE;
        break;
      case 91:
        state.positioningMode = PositioningMode.RELATIVE;
        break;
      default:
        if (code >= 54 && code <= 59 && Number.isInteger(code)) {
          state.coordinateSystem = code - 53;
        }
    }
  }

  // Motion resolution: explicit, cancelled, or carried over from an earlier line
  let lineMotion: MotionMode | null = null;
  if (motion !== null) {
    state.motionMode = motion;
    lineMotion = motion;
  } else if (motionCancelled) {
    state.motionMode = null;
    if (hasAxisWords && !axesConsumed) {
      fail("Axis words while motion is cancelled by G80");
    }
  } else if (hasAxisWords && !axesConsumed) {
    if (state.motionMode === null) {
      fail("Axis words with no active motion mode");
    }
    lineMotion = state.motionMode;
  }

  if (programFlow === 2 || programFlow === 30) {
    endProgram(state);
  }

  const isMotion = lineMotion !== null && hasAxisWords;
  let commandType: CommandType;
  if (isMotion) commandType = CommandType.MOTION;
  else if (nonModal !== null) commandType = CommandType.NON_MODAL;
  else if (programFlow !== null) commandType = CommandType.PROGRAM_FLOW;
  else if (spindle !== null) commandType = CommandType.SPINDLE;
  else if (coolantCodes.length > 0) commandType = CommandType.COOLANT;
  else if (tool !== null) commandType = CommandType.TOOL_CHANGE;
  else if (modeChanged || motion !== null || motionCancelled)
    commandType = CommandType.MODE_CHANGE;
  else if (Object.keys(parameters).length > 0)
    commandType = CommandType.PARAMETERS_ONLY;
  else commandType = CommandType.EMPTY;

  let modalGroup: ModalGroup;
  if (isMotion) modalGroup = ModalGroup.MOTION;
  else if (nonModal !== null) modalGroup = ModalGroup.NON_MODAL;
  else modalGroup = firstGroup ?? ModalGroup.NONE;

  return Object.freeze({
    sourceLine,
    lineNumber,
    modalGroup,
    commandType,
    gCodes: Object.freeze([...gCodes]),
    mCodes: Object.freeze([...mCodes]),
    motion: lineMotion,
    parameters: Object.freeze(parameters),
    comment: comments.length > 0 ? comments.join(" ") : null,
    text: words.join(" "),
  });
}

function applyCoolant(current: CoolantState, code: number): CoolantState {
  if (code === 9) return CoolantState.OFF;
  const adding = code === 7 ? CoolantState.MIST : CoolantState.FLOOD;
  if (current === CoolantState.OFF || current === adding) return adding;
  return CoolantState.BOTH;
}

/**
 * Switches units, rescaling the tracked position so it names the same point.
 */
function setUnits(state: ParserState, units: Units): void {
  if (state.units === units) return;
  const factor = units === Units.INCHES ? 1 / MM_PER_INCH : MM_PER_INCH;
  state.position = {
    x: state.position.x * factor,
    y: state.position.y * factor,
    z: state.position.z * factor,
  };
  state.units = units;
}

// M2/M30 restore these modes; position, units and tool are kept
function endProgram(state: ParserState): void {
  state.motionMode = MotionMode.LINEAR;
  state.plane = Plane.XY;
  state.positioningMode = PositioningMode.ABSOLUTE;
  state.feedRateMode = FeedRateMode.UNITS_PER_MINUTE;
  state.coordinateSystem = 1;
  state.spindleState = SpindleState.OFF;
  state.coolantState = CoolantState.OFF;
}

/**
 * Result of feeding one line to a {@link GCodeParser}.
 */
export interface ParsedLine {
  /** Null for lines with nothing but comments, a checksum or an N word */
  command: ParsedCommand | null;
  segment: Segment | null;
}

function hasContent(tokens: readonly Token[]): boolean {
  return tokens.some(
    (token) =>
      token.type === TokenType.COMMAND || token.type === TokenType.PARAMETER
  );
}

/**
 * Parsing session for one program: owns the modal state and runs each line
 * through lexer, parser and segment generator.
 *
 * @example
 * ```typescript
 * const parser = new GCodeParser();
 * parser.parseLine("G21 G90", 1);
 * const { segment } = parser.parseLine("G1 X10 F500", 2);
 * // segment: LINEAR from (0,0,0) to (10,0,0) at F500
 * ```
 */
export class GCodeParser {
  private state: ParserState;

  constructor(initialPosition?: Point3D) {
    this.state = createParserState(initialPosition);
  }

  /**
   * Parses one line of text.
   * @param sourceLine - 1-based line number used in errors and segments
   * @throws GCodeSyntaxError or GCodeDomainError; the modal state is unchanged
   */
  parseLine(text: string, sourceLine = 0): ParsedLine {
    let tokens: Token[];
    try {
      tokens = tokenizeLine(text);
    } catch (e) {
      if (e instanceof GCodeSyntaxError) throw e.atLine(sourceLine);
      throw e;
    }
    return this.parseLineTokens(tokens, sourceLine);
  }

  /**
   * Parses an already tokenized line.
   */
  parseLineTokens(tokens: readonly Token[], sourceLine = 0): ParsedLine {
    if (!hasContent(tokens)) return { command: null, segment: null };
    const next = cloneParserState(this.state);
    const command = parseTokens(tokens, next, sourceLine);
    const segment = generateSegment(command, next);
    this.state = next;
    return { command, segment };
  }

  /**
   * Copy of the current modal state.
   */
  getState(): ParserState {
    return cloneParserState(this.state);
  }

  /**
   * Restores the power-on state.
   */
  reset(initialPosition?: Point3D): void {
    this.state = createParserState(initialPosition);
  }
}
