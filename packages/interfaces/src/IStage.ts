import type { StageRole } from "@sector-report/pipeline-core";

export interface IStage<I, O> {
  id: string;
  role: StageRole;
  init(): Promise<void>;
  run(input: I): Promise<O>;
}
