export * from "./colors";
export * from "./fs";
export * from "./misc";
export * from "./nunjucksRelativeLoader";
export * from "./promiseSeries";
export * from "./tableCli";
export * from "./types";
