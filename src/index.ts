export * from "./core/types.js";
export * from "./core/interfaces.js";
export * from "./core/reportParser.js";
export * from "./core/counterReconciler.js";
export * from "./core/normalizer.js";
export * from "./core/rowBuilder.js";
export * from "./core/missingTally.js";
export * from "./core/corpusDriver.js";

export * from "./adapters/darshan/commandRunner.js";
export * from "./adapters/darshan/parserReportSource.js";
export * from "./adapters/darshan/scratchDir.js";

export * from "./backends/index.js";
