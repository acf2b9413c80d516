export * from "./types";
export { formatStage } from "./format";
export { clinicalRuleStage } from "./clinicalRule";
export { temporalStage } from "./temporal";
export { crossFactStage, isMaterialDifference } from "./crossFact";
export { contradictionStage } from "./contradiction";
export { completenessStage, isDischargeMedication } from "./completeness";
