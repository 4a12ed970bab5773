export { SectorAgent } from "./SectorAgent";
export type { ClassificationOutcome, ClassificationReport, SectorAgentOptions } from "./SectorAgent";
export { buildSectorPrompt, classifySector } from "./utils/llm";
