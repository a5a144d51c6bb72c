/**
 * Outbound half of the protocol codec.
 *
 * Every {@link GrblCommand} formats to one newline-terminated line and every
 * {@link RealtimeCommand} to one byte.
 */

import {
  GrblCommand,
  GrblCommandType,
  JogCommand,
  RealtimeCommand,
  SystemCommand,
} from "@grbl-node/types";
import { formatNumber } from "@grbl-node/gcode";

const SYSTEM_COMMAND_TEXT: Record<SystemCommand["type"], string> = {
  [GrblCommandType.HELP]: "$",
  [GrblCommandType.VIEW_SETTINGS]: "$$",
  [GrblCommandType.VIEW_PARAMETERS]: "$#",
  [GrblCommandType.VIEW_PARSER_STATE]: "$G",
  [GrblCommandType.VIEW_BUILD_INFO]: "$I",
  [GrblCommandType.VIEW_STARTUP_BLOCKS]: "$N",
  [GrblCommandType.CHECK_MODE]: "$C",
  [GrblCommandType.KILL_ALARM_LOCK]: "$X",
  [GrblCommandType.HOMING_CYCLE]: "$H",
  [GrblCommandType.SLEEP]: "$SLP",
};

export function formatJog(jog: JogCommand): string {
  const words = ["$J=" + (jog.absolute ? "G90" : "G91")];
  if (jog.inches !== undefined) words.push(jog.inches ? "G20" : "G21");
  if (jog.x !== undefined) words.push(`X${formatNumber(jog.x, 3)}`);
  if (jog.y !== undefined) words.push(`Y${formatNumber(jog.y, 3)}`);
  if (jog.z !== undefined) words.push(`Z${formatNumber(jog.z, 3)}`);
  words.push(`F${formatNumber(jog.feedRate, 0)}`);
  return words.join(" ");
}

/**
 * Wire text of a command, newline included.
 *
 * @example
 * ```typescript
 * formatCommand({ type: GrblCommandType.GCODE, line: " G1 X10 F500 " }); // "G1 X10 F500\n"
 * formatCommand({ type: GrblCommandType.JOG, x: -5, feedRate: 1000 });   // "$J=G91 X-5.000 F1000\n"
 * formatCommand({ type: GrblCommandType.RESET, target: ResetTarget.ALL }); // "$RST=*\n"
 * ```
 */
export function formatCommand(command: GrblCommand): string {
  switch (command.type) {
    case GrblCommandType.GCODE:
      return `${command.line.trim()}\n`;
    case GrblCommandType.JOG:
      return `${formatJog(command)}\n`;
    case GrblCommandType.SET_SETTING:
      return `$${command.setting}=${String(command.value).trim()}\n`;
    case GrblCommandType.RESET:
      return `$RST=${command.target}\n`;
    default:
      return `${SYSTEM_COMMAND_TEXT[command.type]}\n`;
  }
}

/** The single byte GRBL reads for a real-time command. */
export function realtimeByte(command: RealtimeCommand): Buffer {
  return Buffer.from([command]);
}

/** Shorthand for a passthrough G-code line */
export function gcode(line: string): GrblCommand {
  return { type: GrblCommandType.GCODE, line };
}
