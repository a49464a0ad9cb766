/**
 * Core module - extraction engine and filter pipeline
 */

export * from "./errors.js";
export * from "./config.js";

export * from "./models/entities.js";
export * from "./models/records.js";
export * from "./models/signature.js";
export * from "./models/failures.js";

export * from "./loader/source-loader.js";
export * from "./parser/index.js";
export * from "./assembler/entity-assembler.js";
export * from "./filters/index.js";
export * from "./serializer/dataset-serializer.js";
export * from "./extraction/pipeline.js";
export * from "./dataset/dataset-builder.js";
export * from "./provide/callable-provider.js";

export * from "../types/result.js";
