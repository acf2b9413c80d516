/**
 * Single source of truth for all data shapes.
 */

export * from "./clinicalFact";
export * from "./knowledgeBase";
export * from "./timeline";
export * from "./validation";
export * from "./learning";
export * from "./pipeline";
