export * from "./priceFeed";
export * from "./feedOracleAdapter";
export * from "./delegationRegistry";
