import { v4 as uuidv4 } from "uuid";
import type { PipelineBus, PipelineEvents, PipelineTopic, StageRole } from "@sector-report/pipeline-core";
import type { IStage } from "./IStage";

export abstract class BaseStage<I, O> implements IStage<I, O> {
  public id: string;
  public role: StageRole;
  protected bus: PipelineBus | null;

  constructor(id: string, role: StageRole, bus: PipelineBus | null = null) {
    this.id = id;
    this.role = role;
    this.bus = bus;
  }

  async init(): Promise<void> {}

  protected emit<K extends PipelineTopic>(topic: K, payload: PipelineEvents[K]): void {
    this.bus?.publish({
      id: uuidv4(),
      sender: this.id,
      role: this.role,
      topic,
      timestamp: Date.now(),
      payload,
    });
  }

  abstract run(input: I): Promise<O>;
}
