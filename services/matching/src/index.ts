export * from "./constants";
export * from "./errors";
export * from "./fixedPoint";
export * from "./types";
export * from "./pricingMath";
export * from "./optionTerms";
export * from "./optionToken";
export * from "./auctionEngine";
export * from "./escrowAccount";
export * from "./rfqValidator";
export * from "./feeHandler";
export * from "./tokenLedger";
export * from "./router";
