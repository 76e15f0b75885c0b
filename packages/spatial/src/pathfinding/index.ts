/**
 * Pathfinding Module
 */

export { astarPath, astarPathFourWayGrid } from "./astar";
export { FourWayGridGraph, STEP_COST, TIE_BREAK_NUDGE } from "./four-way-graph";
export { Frontier } from "./frontier";
