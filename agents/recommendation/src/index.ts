export { RecommendationAgent, type RecommendationAgentOptions } from "./RecommendationAgent";
export { buildRecommendationPrompt, recommendSectors } from "./utils/llm";
