export * from "./autopilot";
export * from "./sdk";
export * from "./step";
export * from "./coreSteps";
export * from "./history";
export * from "./context";
export * from "./observation";
export * from "./filesystem";
export * from "./errors";
export * from "./pathResolver";
export * from "./ideHost";
export * from "./localIdeHost";
export * from "./commandRunner";
export * from "./secretGatedResource";
export * from "./models";
export * from "./config";
export * from "./llmAdapter";
export * from "./openAIAdapter";
export * from "./huggingFaceAdapter";
export * from "./logging";
export * from "./sessionServer";
