/**
 * Turtle unit sizing.
 */

export type { UnitSizer, UnitSizingInput, UnitSizingResult } from "./types.js";
export { TurtleUnitSizer } from "./unit-sizer.js";
