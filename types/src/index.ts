/**
 * @grbl-node/types
 *
 * Shared TypeScript type definitions for the GRBL controller engine.
 */

// G-code types
export * from "./gcode-types";

// GRBL protocol types
export * from "./grbl-constants";
export * from "./grbl-types";
