/**
 * Core control logic
 *
 * Pure functions with no I/O:
 * - curve: compile control points into segments and evaluate them
 * - actuation-gate: debounce fan commands on temperature change
 */

export * from './curve';
export * from './actuation-gate';
