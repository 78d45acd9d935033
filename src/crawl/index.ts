export * from "./htmlParser";
