/**
 * Constraint logic programming engine: program trees, exact integer domains,
 * and the reduce / sample / apply solving loop.
 */

// Values and arithmetic
export * from "./value";

// Program trees and constructors
export * from "./expr";

// Interval sets
export * from "./domain";

// Solving pipeline
export * from "./free";
export * from "./reduce";
export * from "./sample";
export * from "./apply";
export * from "./narrow";
export * from "./validate";
export * from "./solve";

// Text and JSON forms
export * from "./format";
export * from "./decode";
