import type { PipelineMessage, PipelineTopic } from '../schemas/types';

type Callback<K extends PipelineTopic> = (message: PipelineMessage<K>) => void;
type Listener = (message: PipelineMessage) => void;

function isTopic<K extends PipelineTopic>(message: PipelineMessage, topic: K): message is PipelineMessage<K> {
  return message.topic === topic;
}

export class PipelineBus {
  private topics: Map<PipelineTopic, Listener[]> = new Map();

  subscribe<K extends PipelineTopic>(topic: K, handler: Callback<K>): () => void {
    const listener: Listener = (message) => {
      if (isTopic(message, topic)) handler(message);
    };
    this.topics.set(topic, [...(this.topics.get(topic) ?? []), listener]);
    return () => {
      this.topics.set(topic, (this.topics.get(topic) ?? []).filter((fn) => fn !== listener));
    };
  }

  publish<K extends PipelineTopic>(message: PipelineMessage<K>): void {
    const handlers = this.topics.get(message.topic) ?? [];
    handlers.forEach((fn) => fn(message));
  }

  listenerCount(topic: PipelineTopic): number {
    return this.topics.get(topic)?.length ?? 0;
  }
}
