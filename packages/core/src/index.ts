export * from "./siteModel";
export * from "./emissionFactors";
export * from "./feasibilityGate";
export * from "./performanceModel";
export * from "./investmentEvaluator";
export * from "./economicsEngine";
export * from "./processDemand";
export * from "./assessment";
export * from "./reporting/estimateReport";
export * from "./reporting/cashFlowChart";
