/**
 * Agent Module Exports
 */

export * from "./patient-context";
export * from "./vital-signs";
export * from "./medication-rules";
export * from "./procedure-rules";
export * from "./guided-airway";
export * from "./decision-resolver";
export * from "./recall-engine";
