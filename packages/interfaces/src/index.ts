export type { IStage } from "./IStage";
export { BaseStage } from "./BaseStage";
