export * from "./corpusWriter";
export * from "./extractor";
export * from "./jatsExtractor";
export * from "./markupExtractor";
export * from "./textCleaner";
